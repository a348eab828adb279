/**
 * @fileoverview Utilities module exports.
 *
 * @module utils
 */

export { ErrorMapper, describeError } from "./ErrorMapper";
