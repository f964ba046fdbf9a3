import {EventEmitter} from 'events';
import {Logging} from 'homebridge';
import {DeviceStatus, HeaterClient} from './heater/client.js';
import {ConnectivityError, NotReadyError, errorMessage} from './heater/errors.js';

export const DEFAULT_POLL_INTERVAL_SECONDS = 30;
// setInterval treats longer delays as 1ms
export const MAX_POLL_INTERVAL_SECONDS = Math.floor(0x7fffffff / 1000);

export type ControllerState = Readonly<{
  lastStatus: DeviceStatus | null;
  lastError: ConnectivityError | null;
  lastUpdateTime: Date | null;
}>;

export type ControllerPhase = 'idle' | 'polling';

export type StateListener = (state: ControllerState) => void;

const stateChanged = 'stateChanged';

const emptyState: ControllerState = Object.freeze({
  lastStatus: null,
  lastError: null,
  lastUpdateTime: null,
});

function sameStatus(a: DeviceStatus | null, b: DeviceStatus | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.isOn === b.isOn &&
    a.currentTemperature === b.currentTemperature &&
    a.targetTemperature === b.targetTemperature;
}

function asConnectivityError(error: unknown): ConnectivityError {
  return error instanceof ConnectivityError ? error : new ConnectivityError(errorMessage(error), undefined, {cause: error});
}

/**
 * Polls one heater on a fixed interval and keeps the last known status.
 *
 * At most one fetch is in flight. A forced refresh that arrives mid-fetch
 * queues a single follow-up fetch which every later request shares until it
 * starts. Forced refreshes leave the interval timer's phase alone.
 */
export class PollingController {
  private state: ControllerState = emptyState;
  private inFlight?: Promise<void>;
  private queued?: Promise<void>;
  private interval?: NodeJS.Timeout;
  private abortController?: AbortController;
  private readonly events = new EventEmitter();
  private readonly pollIntervalMs: number;

  constructor(
    private readonly client: HeaterClient,
    private readonly log: Logging,
    readonly name: string,
    pollIntervalSeconds: number = DEFAULT_POLL_INTERVAL_SECONDS,
  ) {
    this.pollIntervalMs = Math.min(pollIntervalSeconds, MAX_POLL_INTERVAL_SECONDS) * 1000;
  }

  get phase(): ControllerPhase {
    return this.inFlight ? 'polling' : 'idle';
  }

  get running(): boolean {
    return this.abortController !== undefined;
  }

  /**
   * The snapshot is frozen, but `lastError` is the live error object.
   */
  getState(): ControllerState {
    return this.state;
  }

  subscribe(listener: StateListener): () => void {
    const guarded: StateListener = state => {
      try {
        listener(state);
      } catch (error) {
        this.log.error(`${this.name}: state listener failed (${errorMessage(error)})`);
      }
    };
    this.events.on(stateChanged, guarded);
    return () => {
      this.events.off(stateChanged, guarded);
    };
  }

  /**
   * Runs the initial status request. Rejects with NotReadyError when the heater
   * cannot be reached, in which case no timer is started. The request counts as
   * the in-flight fetch, so refreshes requested meanwhile queue behind it.
   */
  async start(): Promise<void> {
    this.stop();
    this.state = emptyState;
    const abortController = new AbortController();
    this.abortController = abortController;

    const outcome: {failed: boolean; error?: unknown} = {failed: false};
    const initial: Promise<void> = this.client.getStatus(abortController.signal)
      .then(status => {
        if (!abortController.signal.aborted) {
          this.apply({lastStatus: status, lastError: null, lastUpdateTime: new Date()});
        }
      }, (error: unknown) => {
        outcome.failed = true;
        outcome.error = error;
      })
      .finally(() => {
        if (this.inFlight === initial) {
          this.inFlight = undefined;
        }
      });
    this.inFlight = initial;
    await initial;

    if (this.abortController !== abortController) {
      throw new NotReadyError(`${this.name}: stopped during setup`);
    }
    if (outcome.failed) {
      this.abortController = undefined;
      this.queued = undefined;
      throw new NotReadyError(`${this.name}: initial status request failed (${errorMessage(outcome.error)})`, {cause: outcome.error});
    }

    this.log.debug(`${this.name}: polling every ${this.pollIntervalMs / 1000}s`);
    this.interval = setInterval(() => {
      this.log.debug(`${this.name}: scheduled poll at ${new Date().toISOString()}`);
      void this.poll();
    }, this.pollIntervalMs);
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    if (this.abortController) {
      this.log.debug(`${this.name}: stopping poller`);
      this.abortController.abort();
      this.abortController = undefined;
    }
    this.inFlight = undefined;
    this.queued = undefined;
  }

  /**
   * Timer-driven poll: joins a fetch that is already running.
   */
  poll(): Promise<void> {
    if (!this.running) {
      return Promise.resolve();
    }
    return this.inFlight ?? this.fetch();
  }

  /**
   * Forced refresh. Never rejects; failures land in `lastError`.
   */
  requestRefresh(): Promise<void> {
    if (!this.running) {
      return Promise.resolve();
    }
    if (!this.inFlight) {
      return this.fetch();
    }
    if (!this.queued) {
      this.log.debug(`${this.name}: refresh requested while polling, queueing one follow-up`);
      const queued = this.inFlight.then(() => {
        if (this.queued !== queued) {
          return;
        }
        this.queued = undefined;
        return this.poll();
      });
      this.queued = queued;
    }
    return this.queued;
  }

  private fetch(): Promise<void> {
    const abortController = this.abortController;
    if (!abortController) {
      return Promise.resolve();
    }
    const request: Promise<void> = this.client.getStatus(abortController.signal)
      .then(status => {
        if (abortController.signal.aborted) {
          return;
        }
        this.apply({lastStatus: status, lastError: null, lastUpdateTime: new Date()});
      }, (error: unknown) => {
        if (abortController.signal.aborted) {
          return;
        }
        const lastError = asConnectivityError(error);
        this.log.warn(`${this.name}: status poll failed, keeping last known state (${lastError.message})`);
        this.apply({lastStatus: this.state.lastStatus, lastError, lastUpdateTime: new Date()});
      })
      .finally(() => {
        if (this.inFlight === request) {
          this.inFlight = undefined;
        }
      });
    this.inFlight = request;
    return request;
  }

  private apply(next: ControllerState): void {
    const previous = this.state;
    this.state = Object.freeze({...next});
    if (!sameStatus(previous.lastStatus, next.lastStatus) || previous.lastError?.message !== next.lastError?.message) {
      this.log.debug(`${this.name}: state changed (${JSON.stringify(next.lastStatus)}, error: ${next.lastError?.message ?? 'none'})`);
      this.events.emit(stateChanged, this.state);
    }
  }
}
