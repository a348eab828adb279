import { expect } from "chai";
import { RunConfig } from "../../../src/config";
import { DeploymentReport } from "../../../src/deployment";
import { Scheduler } from "../../../src/scheduler/Scheduler";
import { MockHost } from "../mock";

function emptyReport(): DeploymentReport {
  const pass = { ghosts: 0, revived: 0, failed: 0, deferred: 0, modulesInserted: 0 };
  return { offset: { x: 0, y: 0 }, seededPatches: [], firstPass: pass, secondPass: pass, provisionedHubs: 0 };
}

describe("Scheduler", () => {
  let host: MockHost;
  let deployCalls: number;

  function createScheduler(saveAfterTicks: number, deploy?: () => DeploymentReport): Scheduler {
    const config: RunConfig = {
      blueprintString: "layout",
      botCount: 0,
      saveAfterTicks,
      saveGameName: "test-save",
    };
    return new Scheduler(host, config, () => {
      deployCalls++;
      return deploy ? deploy() : emptyReport();
    });
  }

  beforeEach(() => {
    host = new MockHost();
    deployCalls = 0;
  });

  describe("deployment gate", () => {
    it("should deploy on the first tick and record it", () => {
      const scheduler = createScheduler(0);

      scheduler.handleTick({ tick: 10 });

      expect(deployCalls).to.equal(1);
      expect(scheduler.hasDeployed()).to.be.true;
      expect(scheduler.getStartTick()).to.equal(10);
      expect(scheduler.getLastReport()).to.deep.equal(emptyReport());
    });

    it("should deploy at most once over many ticks", () => {
      const scheduler = createScheduler(0);

      for (let tick = 1; tick <= 500; tick++) {
        scheduler.handleTick({ tick });
      }

      expect(deployCalls).to.equal(1);
      expect(scheduler.getStartTick()).to.equal(1);
    });

    it("should ignore ticks in single player sessions", () => {
      host.multiplayer = false;
      const scheduler = createScheduler(5);

      for (let tick = 1; tick <= 50; tick++) {
        scheduler.handleTick({ tick });
      }

      expect(deployCalls).to.equal(0);
      expect(host.saves).to.deep.equal([]);
      expect(scheduler.getSaveTriggerState()).to.equal("not-started");
    });

    it("should start counting from the first multiplayer tick", () => {
      host.multiplayer = false;
      const scheduler = createScheduler(100);
      scheduler.handleTick({ tick: 1 });
      scheduler.handleTick({ tick: 2 });

      host.multiplayer = true;
      scheduler.handleTick({ tick: 50 });

      expect(scheduler.getStartTick()).to.equal(50);
    });

    it("should not retry a deployment that threw", () => {
      const scheduler = createScheduler(0, () => {
        throw new Error("boom");
      });

      expect(() => scheduler.handleTick({ tick: 3 })).to.throw("boom");
      scheduler.handleTick({ tick: 4 });
      scheduler.handleTick({ tick: 5 });

      expect(deployCalls).to.equal(1);
      expect(scheduler.hasDeployed()).to.be.true;
      expect(scheduler.getLastReport()).to.be.undefined;
    });
  });

  describe("save trigger", () => {
    it("should save on the first tick at or past start + threshold", () => {
      const scheduler = createScheduler(100);

      scheduler.handleTick({ tick: 10 });
      scheduler.handleTick({ tick: 109 });
      expect(host.saves).to.deep.equal([]);

      scheduler.handleTick({ tick: 110 });
      expect(host.saves).to.deep.equal(["test-save"]);
    });

    it("should save when a tick jumps past the threshold", () => {
      const scheduler = createScheduler(100);

      scheduler.handleTick({ tick: 10 });
      scheduler.handleTick({ tick: 250 });

      expect(host.saves).to.deep.equal(["test-save"]);
    });

    it("should save exactly once", () => {
      const scheduler = createScheduler(10);

      for (let tick = 1; tick <= 100; tick++) {
        scheduler.handleTick({ tick });
      }

      expect(host.saves).to.deep.equal(["test-save"]);
      expect(host.printed).to.deep.equal(["saving game"]);
    });

    it("should save when deployment started on tick zero", () => {
      const scheduler = createScheduler(5);

      for (let tick = 0; tick <= 5; tick++) {
        scheduler.handleTick({ tick });
      }

      expect(host.saves).to.deep.equal(["test-save"]);
    });

    it("should never save when the threshold is zero", () => {
      const scheduler = createScheduler(0);

      for (let tick = 1; tick <= 1000; tick += 7) {
        scheduler.handleTick({ tick });
      }

      expect(host.saves).to.deep.equal([]);
      expect(scheduler.getSaveTriggerState()).to.equal("disabled");
    });

    it("should move through not-started, armed and fired", () => {
      const scheduler = createScheduler(2);
      expect(scheduler.getSaveTriggerState()).to.equal("not-started");

      scheduler.handleTick({ tick: 1 });
      expect(scheduler.getSaveTriggerState()).to.equal("armed");

      scheduler.handleTick({ tick: 3 });
      expect(scheduler.getSaveTriggerState()).to.equal("fired");
    });

    it("should not retry a save that threw", () => {
      const scheduler = createScheduler(1);
      let attempts = 0;
      host.serverSave = () => {
        attempts++;
        throw new Error("disk full");
      };

      scheduler.handleTick({ tick: 1 });
      expect(() => scheduler.handleTick({ tick: 2 })).to.throw("disk full");
      scheduler.handleTick({ tick: 3 });

      expect(attempts).to.equal(1);
      expect(scheduler.getSaveTriggerState()).to.equal("fired");
    });
  });
});
