import { MarketSession, SessionEvents, SessionSummary } from "./MarketSession";

/**
 * Drives a session from a wall-clock timer, one tick per callback, so that
 * observers (API, console) can watch it live. Matching never spans callbacks.
 */
export class PacedRunner {
  private timer?: NodeJS.Timeout;

  constructor(
    private session: MarketSession,
    private tickMs = 200
  ) {}

  start(): Promise<SessionSummary> {
    return new Promise((resolve, reject) => {
      const onState = (ev: SessionEvents["state"]) => {
        if (ev.to === "Closed") done();
      };
      const done = () => {
        this.clear();
        this.session.off("state", onState);
        resolve(this.session.summary());
      };
      this.session.on("state", onState);

      if (this.session.state === "Open") this.session.start();
      if (this.session.state === "Closed") return done();

      this.timer = setInterval(() => {
        try {
          if (this.session.state === "Trading") this.session.step();
        } catch (e) {
          this.clear();
          this.session.off("state", onState);
          reject(e);
        }
      }, this.tickMs);
    });
  }

  /** the session closes after its current tick */
  stop() {
    this.session.requestStop();
  }

  private clear() {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }
}
