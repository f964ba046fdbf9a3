import {PlatformAccessory, Service} from 'homebridge';

import {HeaterPlatform} from './platform.js';
import {EndpointConfig, HeaterEndpoint} from './heaterEndpoint.js';
import {HeaterClient} from './heater/client.js';
import {errorMessage} from './heater/errors.js';
import {createThermostatService} from './thermostat/service.js';

export const INITIAL_SETUP_RETRY_DELAY_MS = 15 * 1000;
export const MAX_SETUP_RETRY_DELAY_MS = 5 * 60 * 1000;

export class HeaterPlatformAccessory {
  readonly endpoint: HeaterEndpoint;
  readonly thermostatService: Service;
  private retryTimeout: NodeJS.Timeout | undefined;
  private retryDelayMs = INITIAL_SETUP_RETRY_DELAY_MS;
  private stopped = false;

  constructor(
    readonly platform: HeaterPlatform,
    readonly accessory: PlatformAccessory,
    readonly config: EndpointConfig,
    client?: HeaterClient,
  ) {
    const {Characteristic, Service} = this.platform;
    this.endpoint = new HeaterEndpoint(config, this.platform.log, client);

    const informationService = this.accessory.getService(Service.AccessoryInformation) ??
      this.accessory.addService(Service.AccessoryInformation);
    informationService
      .setCharacteristic(Characteristic.Manufacturer, 'LAN Heater')
      .setCharacteristic(Characteristic.Model, 'Space Heater')
      .setCharacteristic(Characteristic.SerialNumber, config.host);

    this.thermostatService = createThermostatService(this);
  }

  get displayName(): string {
    return this.accessory.displayName;
  }

  /**
   * Runs the heater's setup. A heater that is not reachable yet is retried
   * with a doubling delay until it answers or the accessory is stopped.
   */
  async start(): Promise<void> {
    if (this.stopped) {
      return;
    }
    const result = await this.endpoint.onSetup();
    if (this.stopped) {
      return;
    }
    if (result.status === 'ready') {
      this.retryDelayMs = INITIAL_SETUP_RETRY_DELAY_MS;
      return;
    }
    this.platform.log.warn(`${this.config.name} not ready at ${this.config.host}: ${result.reason}`);
    this.scheduleRetry();
  }

  stop(): void {
    this.stopped = true;
    clearTimeout(this.retryTimeout);
    this.retryTimeout = undefined;
    this.endpoint.onTeardown();
  }

  private scheduleRetry(): void {
    const delay = this.retryDelayMs;
    this.retryDelayMs = Math.min(delay * 2, MAX_SETUP_RETRY_DELAY_MS);
    this.platform.log.info(`${this.config.name}: retrying setup in ${delay / 1000}s`);
    clearTimeout(this.retryTimeout);
    this.retryTimeout = setTimeout(() => {
      this.retryTimeout = undefined;
      this.start().catch(error => {
        this.platform.log.error(`${this.config.name}: setup failed (${errorMessage(error)})`);
      });
    }, delay);
  }
}
