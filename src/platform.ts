import {
  API,
  DynamicPlatformPlugin,
  Logging,
  PlatformAccessory,
  Service,
  Characteristic,
  PlatformConfig,
} from 'homebridge';

import {PLATFORM_NAME, PLUGIN_NAME} from './settings.js';
import {HeaterPlatformAccessory} from './platformAccessory.js';
import {EndpointConfig} from './heaterEndpoint.js';
import {DEFAULT_POLL_INTERVAL_SECONDS, MAX_POLL_INTERVAL_SECONDS} from './pollingController.js';
import {errorMessage} from './heater/errors.js';

export const DEFAULT_HEATER_NAME = 'Heater';
export const MIN_POLL_INTERVAL_SECONDS = 5;

export type HeaterConfig = {
  name?: string;
  host: string;
  token: string;
  poll_interval_seconds?: number;
};

type ParsedConfig = [true, EndpointConfig[]] | [false, string];

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export const parseConfig = (config: PlatformConfig, log: Logging): ParsedConfig => {
  const heaters: unknown = config.heaters;
  if (!heaters || !Array.isArray(heaters) || heaters.length === 0) {
    return [false, 'No heaters configured - plugin will not start'];
  }

  const endpoints: EndpointConfig[] = [];
  for (const [index, entry] of heaters.entries()) {
    const position = index + 1;
    const heater: unknown = entry;
    if (typeof heater !== 'object' || heater === null) {
      return [false, `Heater #${position} is not an object`];
    }
    const host = 'host' in heater ? heater.host : undefined;
    if (!nonEmptyString(host)) {
      return [false, `Heater #${position} is missing a host`];
    }
    const token = 'token' in heater ? heater.token : undefined;
    if (!nonEmptyString(token)) {
      return [false, `Heater #${position} is missing a token`];
    }
    if (endpoints.some(e => e.host === host.trim())) {
      return [false, `Heater host ${host.trim()} is configured more than once`];
    }

    const name = 'name' in heater && nonEmptyString(heater.name) ? heater.name : DEFAULT_HEATER_NAME;
    let pollIntervalSeconds = DEFAULT_POLL_INTERVAL_SECONDS;
    const interval = 'poll_interval_seconds' in heater ? heater.poll_interval_seconds : undefined;
    if (interval !== undefined) {
      if (typeof interval !== 'number' || !Number.isFinite(interval) || interval > MAX_POLL_INTERVAL_SECONDS) {
        return [false, `Heater #${position} has an invalid poll_interval_seconds`];
      }
      pollIntervalSeconds = interval;
    }
    if (pollIntervalSeconds < MIN_POLL_INTERVAL_SECONDS) {
      log.warn(`${name}: polling interval must be at least ${MIN_POLL_INTERVAL_SECONDS} seconds. Using ${MIN_POLL_INTERVAL_SECONDS} seconds.`);
      pollIntervalSeconds = MIN_POLL_INTERVAL_SECONDS;
    }
    endpoints.push({name, host: host.trim(), authToken: token, pollIntervalSeconds});
  }
  return [true, endpoints];
};

// When this event is fired it means Homebridge has restored all cached accessories from disk.
// Dynamic Platform plugins should only register new accessories after this event was fired.
const didFinishLaunching = 'didFinishLaunching';
const shutdown = 'shutdown';

export class HeaterPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // this is used to track restored cached accessories
  public readonly accessories: PlatformAccessory[] = [];
  public readonly heaterAccessories = new Map<string, HeaterPlatformAccessory>();
  private readonly heaters: EndpointConfig[] = [];

  constructor(
    public readonly log: Logging,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = api.hap.Service;
    this.Characteristic = api.hap.Characteristic;

    const [validConfig, result] = parseConfig(this.config, log);
    if (!validConfig) {
      this.log.error(result);
      return;
    }
    this.heaters = result;

    this.log.debug('Finished initializing platform:', config.platform);
    this.api.on(didFinishLaunching, () => {
      log.debug('Executed didFinishLaunching callback');
      this.discoverDevices().catch(err => {
        this.log.error(`error during device discovery (${errorMessage(err)})`);
      });
    });
    this.api.on(shutdown, () => {
      this.teardown();
    });
  }

  /**
   * Invoked when homebridge restores cached accessories from disk at startup.
   */
  configureAccessory(accessory: PlatformAccessory) {
    this.log.info('Loading accessory from cache:', accessory.displayName);
    this.accessories.push(accessory);
  }

  /**
   * Creates or restores one accessory per configured heater and runs each
   * heater's setup. Cached accessories for heaters that are no longer
   * configured are unregistered.
   */
  discoverDevices(): Promise<void> {
    const setups: Promise<void>[] = [];
    const configured = new Set<string>();

    for (const heater of this.heaters) {
      const uuid = this.api.hap.uuid.generate(heater.host);
      configured.add(uuid);
      if (this.heaterAccessories.has(uuid)) {
        continue;
      }

      let accessory = this.accessories.find(a => a.UUID === uuid);
      if (accessory) {
        this.log.info('Restoring existing accessory from cache:', accessory.displayName);
      } else {
        this.log.info('Adding new accessory:', heater.name);
        accessory = new this.api.platformAccessory(heater.name, uuid);
        this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
        this.accessories.push(accessory);
      }

      const heaterAccessory = new HeaterPlatformAccessory(this, accessory, heater);
      this.heaterAccessories.set(uuid, heaterAccessory);
      setups.push(heaterAccessory.start());
    }

    const stale = this.accessories.filter(a => !configured.has(a.UUID));
    if (stale.length > 0) {
      stale.forEach(a => this.log.info('Removing accessory no longer in config:', a.displayName));
      this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
      this.accessories.splice(0, this.accessories.length, ...this.accessories.filter(a => configured.has(a.UUID)));
    }

    return Promise.all(setups).then(() => undefined);
  }

  teardown(): void {
    this.heaterAccessories.forEach(heaterAccessory => heaterAccessory.stop());
  }
}
