/**
 * @fileoverview Errors raised by blueprint deployment.
 *
 * Only failures that make the whole deployment meaningless are thrown.
 * A ghost that cannot be revived is reported in the pass statistics instead.
 *
 * @module deployment/DeploymentError
 */

export class DeploymentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeploymentError";
  }
}

/**
 * The payload could not be turned into blueprint entities, or stamping it
 * placed nothing to anchor the offset on.
 */
export class BlueprintDecodeError extends DeploymentError {
  constructor(message: string) {
    super(message);
    this.name = "BlueprintDecodeError";
  }
}
