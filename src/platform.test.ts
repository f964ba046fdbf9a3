import {describe, expect, test, jest, afterEach, beforeEach} from '@jest/globals';
import {PlatformConfig} from 'homebridge';
import {HomebridgeAPI} from 'homebridge/lib/api';
import {Logger} from 'homebridge/lib/logger';
import {HeaterConfig, HeaterPlatform, parseConfig} from './platform';
import {HeaterPlatformAccessory} from './platformAccessory';
import {FakeServer, start} from './fakeserver/server';
import {fakeClient, heaterStatus} from './fakeserver/fakeClient';
import {newSetters} from './thermostat/setters';
import {PLATFORM_NAME, PLUGIN_NAME} from './settings';
import {ConnectivityError, ValidationError} from './heater/errors';

function createPluginForTest(config: PlatformConfig): { api: HomebridgeAPI; platform: HeaterPlatform } {
  const api = new HomebridgeAPI();
  const logger = Logger.withPrefix('test');
  jest.spyOn(logger, 'error').mockImplementation(() => {
  });
  jest.spyOn(logger, 'warn').mockImplementation(() => {
  });
  jest.spyOn(logger, 'info').mockImplementation(() => {
  });
  return {api, platform: new HeaterPlatform(logger, config, api)};
}

function pluginConfig(...heaters: unknown[]): PlatformConfig {
  return {platform: PLATFORM_NAME, heaters};
}

function onlyHeaterAccessory(platform: HeaterPlatform): HeaterPlatformAccessory {
  const [heaterAccessory] = [...platform.heaterAccessories.values()];
  expect(heaterAccessory).toBeDefined();
  return heaterAccessory;
}

describe('platform', () => {
  describe('startup', () => {
    test('with no heaters', () => {
      const {api, platform} = createPluginForTest({platform: PLATFORM_NAME});
      api.signalFinished();
      expect(platform.log.error).toHaveBeenCalledWith('No heaters configured - plugin will not start');
      expect(platform.heaterAccessories.size).toBe(0);
    });

    test('with non-array heaters', () => {
      const {platform} = createPluginForTest({platform: PLATFORM_NAME, heaters: {host: '192.168.1.20'}});
      expect(platform.log.error).toHaveBeenCalledWith('No heaters configured - plugin will not start');
    });

    test('with a heater missing its host', () => {
      const {platform} = createPluginForTest(pluginConfig({token: 'test-secret'}));
      expect(platform.log.error).toHaveBeenCalledWith('Heater #1 is missing a host');
    });

    test('with a heater missing its token', () => {
      const {platform} = createPluginForTest(pluginConfig(
        {host: '192.168.1.20', token: 'test-secret'},
        {host: '192.168.1.21', token: ' '},
      ));
      expect(platform.log.error).toHaveBeenCalledWith('Heater #2 is missing a token');
    });

    test('with an invalid polling interval', () => {
      const {platform} = createPluginForTest(pluginConfig(
        {host: '192.168.1.20', token: 'test-secret', poll_interval_seconds: 'often'},
      ));
      expect(platform.log.error).toHaveBeenCalledWith('Heater #1 has an invalid poll_interval_seconds');
    });

    test('with the same host twice', () => {
      const {platform} = createPluginForTest(pluginConfig(
        {host: '192.168.1.20', token: 'test-secret'},
        {host: '192.168.1.20 ', token: 'test-secret'},
      ));
      expect(platform.log.error).toHaveBeenCalledWith('Heater host 192.168.1.20 is configured more than once');
    });
  });

  describe('parseConfig', () => {
    test('fills in defaults', () => {
      const {platform} = createPluginForTest(pluginConfig());
      const heater: HeaterConfig = {host: '192.168.1.20', token: 'test-secret'};

      expect(parseConfig(pluginConfig(heater), platform.log)).toEqual([true, [{
        name: 'Heater',
        host: '192.168.1.20',
        authToken: 'test-secret',
        pollIntervalSeconds: 30,
      }]]);
    });

    test('rejects a polling interval longer than timers allow', () => {
      const {platform} = createPluginForTest(pluginConfig());
      const heater: HeaterConfig = {host: '192.168.1.20', token: 'test-secret', poll_interval_seconds: 3_000_000};

      expect(parseConfig(pluginConfig(heater), platform.log))
        .toEqual([false, 'Heater #1 has an invalid poll_interval_seconds']);
    });

    test('accepts the longest polling interval', () => {
      const {platform} = createPluginForTest(pluginConfig());
      const heater: HeaterConfig = {host: '192.168.1.20', token: 'test-secret', poll_interval_seconds: 2_147_483};

      const [valid, result] = parseConfig(pluginConfig(heater), platform.log);

      expect(valid).toBe(true);
      expect(result).toEqual([expect.objectContaining({pollIntervalSeconds: 2_147_483})]);
    });

    test('raises a too short polling interval', () => {
      const {platform} = createPluginForTest(pluginConfig());
      const heater: HeaterConfig = {name: 'Bedroom', host: '192.168.1.20', token: 'test-secret', poll_interval_seconds: 1};

      expect(parseConfig(pluginConfig(heater), platform.log)).toEqual([true, [{
        name: 'Bedroom',
        host: '192.168.1.20',
        authToken: 'test-secret',
        pollIntervalSeconds: 5,
      }]]);
      expect(platform.log.warn).toHaveBeenCalledWith('Bedroom: polling interval must be at least 5 seconds. Using 5 seconds.');
    });
  });

  describe('with a reachable heater', () => {
    let server: FakeServer;
    let api: HomebridgeAPI;
    let platform: HeaterPlatform;

    beforeEach(async () => {
      server = await start();
      ({api, platform} = createPluginForTest(pluginConfig({name: 'Bedroom', host: server.host, token: server.token})));
    });

    afterEach(async () => {
      platform.teardown();
      await server.stop();
    });

    test('registers an accessory and publishes the heater state', async () => {
      jest.spyOn(api, 'registerPlatformAccessories');

      await platform.discoverDevices();

      expect(api.registerPlatformAccessories).toHaveBeenCalledTimes(1);
      const heaterAccessory = onlyHeaterAccessory(platform);
      expect(heaterAccessory.endpoint.ready).toBe(true);
      const {Characteristic} = api.hap;
      const thermostat = heaterAccessory.thermostatService;
      expect(thermostat.getCharacteristic(Characteristic.CurrentTemperature).value).toBe(18);
      expect(thermostat.getCharacteristic(Characteristic.TargetTemperature).value).toBe(20);
      expect(thermostat.getCharacteristic(Characteristic.TargetHeatingCoolingState).value)
        .toBe(Characteristic.TargetHeatingCoolingState.OFF);
    });

    test('turns the heater on from HomeKit', async () => {
      await platform.discoverDevices();
      const heaterAccessory = onlyHeaterAccessory(platform);
      const {Characteristic} = api.hap;

      await newSetters(heaterAccessory).setTargetState(Characteristic.TargetHeatingCoolingState.HEAT);

      expect(server.heater.power).toBe('on');
      expect(heaterAccessory.endpoint.getState().lastStatus).toEqual(heaterStatus(true, 18, 20));
      expect(heaterAccessory.thermostatService.getCharacteristic(Characteristic.CurrentHeatingCoolingState).value)
        .toBe(Characteristic.CurrentHeatingCoolingState.HEAT);
    });

    test('ignores heating modes the heater does not have', async () => {
      await platform.discoverDevices();
      const heaterAccessory = onlyHeaterAccessory(platform);
      const requestsBefore = server.requests.length;

      await newSetters(heaterAccessory).setTargetState(api.hap.Characteristic.TargetHeatingCoolingState.COOL);

      expect(platform.log.error).toHaveBeenCalledWith('Bedroom: unsupported heating mode 2');
      expect(server.requests).toHaveLength(requestsBefore);
    });

    test('sets the target temperature from HomeKit', async () => {
      await platform.discoverDevices();
      const heaterAccessory = onlyHeaterAccessory(platform);
      const setters = newSetters(heaterAccessory);

      await setters.setTargetTemp(22.5);

      expect(server.heater.target_temperature).toBe(22.5);
      expect(heaterAccessory.thermostatService.getCharacteristic(api.hap.Characteristic.TargetTemperature).value)
        .toBe(22.5);
      await expect(setters.setTargetTemp('warm')).rejects.toBeInstanceOf(ValidationError);
    });

    test('restores cached accessories and removes the ones no longer configured', async () => {
      const cached = new api.platformAccessory('Bedroom', api.hap.uuid.generate(server.host));
      const stale = new api.platformAccessory('Garage', api.hap.uuid.generate('10.0.0.99'));
      platform.configureAccessory(cached);
      platform.configureAccessory(stale);
      jest.spyOn(api, 'registerPlatformAccessories');
      jest.spyOn(api, 'unregisterPlatformAccessories');

      await platform.discoverDevices();

      expect(api.registerPlatformAccessories).not.toHaveBeenCalled();
      expect(api.unregisterPlatformAccessories).toHaveBeenCalledWith(PLUGIN_NAME, PLATFORM_NAME, [stale]);
      expect(platform.accessories).toHaveLength(1);
      expect(platform.accessories[0]).toBe(cached);
      expect(onlyHeaterAccessory(platform).accessory).toBe(cached);
    });

    test('tears the heaters down on shutdown', async () => {
      await platform.discoverDevices();
      const heaterAccessory = onlyHeaterAccessory(platform);

      api.signalShutdown();

      expect(heaterAccessory.endpoint.ready).toBe(false);
    });
  });

  describe('with an unreachable heater', () => {
    let server: FakeServer;
    let platform: HeaterPlatform;

    afterEach(async () => {
      platform.teardown();
      await server.stop();
    });

    test('reports the heater as not ready and schedules a retry', async () => {
      server = await start();
      server.failWith(503);
      ({platform} = createPluginForTest(pluginConfig({name: 'Bedroom', host: server.host, token: server.token})));

      await platform.discoverDevices();

      expect(onlyHeaterAccessory(platform).endpoint.ready).toBe(false);
      expect(platform.log.warn).toHaveBeenCalledWith(`Bedroom not ready at ${server.host}: API error 503: Service Unavailable`);
      expect(platform.log.info).toHaveBeenCalledWith('Bedroom: retrying setup in 15s');
    });
  });
});

describe('HeaterPlatformAccessory setup retries', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  test('retries with a doubling delay until the heater answers', async () => {
    jest.useFakeTimers();
    const {api, platform} = createPluginForTest(pluginConfig({host: '192.168.1.20', token: 'test-secret'}));
    const client = fakeClient(heaterStatus(true, 19, 21));
    client.getStatus
      .mockRejectedValueOnce(new ConnectivityError('API error 503: Service Unavailable', 503))
      .mockRejectedValueOnce(new ConnectivityError('API error 503: Service Unavailable', 503));
    const accessory = new api.platformAccessory('Bedroom', api.hap.uuid.generate('192.168.1.20'));
    const heaterAccessory = new HeaterPlatformAccessory(platform, accessory, {
      name: 'Bedroom',
      host: '192.168.1.20',
      authToken: 'test-secret',
      pollIntervalSeconds: 30,
    }, client);

    await heaterAccessory.start();
    expect(client.getStatus).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(15_000);
    expect(client.getStatus).toHaveBeenCalledTimes(2);
    expect(heaterAccessory.endpoint.ready).toBe(false);

    await jest.advanceTimersByTimeAsync(29_999);
    expect(client.getStatus).toHaveBeenCalledTimes(2);
    await jest.advanceTimersByTimeAsync(1);
    expect(client.getStatus).toHaveBeenCalledTimes(3);
    expect(heaterAccessory.endpoint.ready).toBe(true);

    heaterAccessory.stop();
    expect(jest.getTimerCount()).toBe(0);
  });

  test('stop cancels a pending retry', async () => {
    jest.useFakeTimers();
    const {api, platform} = createPluginForTest(pluginConfig({host: '192.168.1.20', token: 'test-secret'}));
    const client = fakeClient();
    client.getStatus.mockRejectedValue(new ConnectivityError('API error 503: Service Unavailable', 503));
    const accessory = new api.platformAccessory('Bedroom', api.hap.uuid.generate('192.168.1.20'));
    const heaterAccessory = new HeaterPlatformAccessory(platform, accessory, {
      name: 'Bedroom',
      host: '192.168.1.20',
      authToken: 'test-secret',
      pollIntervalSeconds: 30,
    }, client);

    await heaterAccessory.start();
    heaterAccessory.stop();

    expect(jest.getTimerCount()).toBe(0);
    await jest.advanceTimersByTimeAsync(60_000);
    expect(client.getStatus).toHaveBeenCalledTimes(1);
  });
});
