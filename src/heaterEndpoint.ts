import {Logging} from 'homebridge';
import {Client, HeaterClient, newDeviceEndpoint} from './heater/client.js';
import {NotReadyError, errorMessage} from './heater/errors.js';
import {CommandHandler} from './commandHandler.js';
import {ControllerState, PollingController, StateListener} from './pollingController.js';

export type EndpointConfig = {
  name: string;
  host: string;
  authToken: string;
  pollIntervalSeconds: number;
};

export type SetupResult =
  | {status: 'ready'}
  | {status: 'not_ready'; reason: string};

type Lifecycle = 'created' | 'ready' | 'torn_down';

/**
 * Lifecycle and control surface of one configured heater. The host calls
 * `onSetup` / `onTeardown`; everything else is only valid in between.
 */
export class HeaterEndpoint {
  private lifecycle: Lifecycle = 'created';
  private readonly controller: PollingController;
  private readonly commands: CommandHandler;
  private pendingSetup?: Promise<SetupResult>;

  constructor(
    readonly config: EndpointConfig,
    private readonly log: Logging,
    client: HeaterClient = new Client(newDeviceEndpoint(config.host, config.authToken), log),
  ) {
    this.controller = new PollingController(client, log, config.name, config.pollIntervalSeconds);
    this.commands = new CommandHandler(client, this.controller, log);
  }

  get ready(): boolean {
    return this.lifecycle === 'ready';
  }

  /**
   * Fetches the first status and starts polling. Overlapping calls share one
   * setup.
   */
  onSetup(): Promise<SetupResult> {
    if (this.lifecycle === 'ready') {
      return Promise.resolve({status: 'ready'});
    }
    if (!this.pendingSetup) {
      const setup: Promise<SetupResult> = this.setup().finally(() => {
        if (this.pendingSetup === setup) {
          this.pendingSetup = undefined;
        }
      });
      this.pendingSetup = setup;
    }
    return this.pendingSetup;
  }

  onTeardown(): void {
    const settingUp = this.pendingSetup !== undefined;
    this.pendingSetup = undefined;
    if (this.lifecycle === 'torn_down' && !settingUp) {
      return;
    }
    this.controller.stop();
    this.lifecycle = 'torn_down';
    this.log.debug(`${this.config.name}: torn down`);
  }

  getState(): ControllerState {
    return this.controller.getState();
  }

  subscribe(listener: StateListener): () => void {
    return this.controller.subscribe(listener);
  }

  async setPower(on: boolean): Promise<void> {
    this.assertReady();
    return this.commands.requestPowerMode(on);
  }

  async setTargetTemperature(celsius: number): Promise<void> {
    this.assertReady();
    return this.commands.requestTargetTemperature(celsius);
  }

  private async setup(): Promise<SetupResult> {
    try {
      await this.controller.start();
    } catch (error) {
      if (error instanceof NotReadyError) {
        const cause = error.cause === undefined ? error : error.cause;
        return {status: 'not_ready', reason: errorMessage(cause)};
      }
      throw error;
    }
    this.lifecycle = 'ready';
    this.log.info(`${this.config.name}: connected to heater at ${this.config.host}`);
    return {status: 'ready'};
  }

  private assertReady(): void {
    if (this.lifecycle !== 'ready') {
      throw new NotReadyError(`${this.config.name} is not set up`);
    }
  }
}
