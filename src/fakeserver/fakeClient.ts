import {jest} from '@jest/globals';
import {Logging} from 'homebridge';
import {Logger} from 'homebridge/lib/logger';
import {DeviceStatus, HeaterClient} from '../heater/client.js';

export type FakeClient = HeaterClient & {
  getStatus: jest.Mock<(signal?: AbortSignal) => Promise<DeviceStatus>>;
  powerOn: jest.Mock<() => Promise<void>>;
  powerOff: jest.Mock<() => Promise<void>>;
  setTargetTemperature: jest.Mock<(celsius: number) => Promise<void>>;
};

export function heaterStatus(isOn: boolean, currentTemperature: number, targetTemperature: number): DeviceStatus {
  return {isOn, currentTemperature, targetTemperature};
}

export function fakeClient(status: DeviceStatus = heaterStatus(false, 18, 20)): FakeClient {
  const client = {
    getStatus: jest.fn<(signal?: AbortSignal) => Promise<DeviceStatus>>(),
    powerOn: jest.fn<() => Promise<void>>(),
    powerOff: jest.fn<() => Promise<void>>(),
    setTargetTemperature: jest.fn<(celsius: number) => Promise<void>>(),
  };
  client.getStatus.mockResolvedValue(status);
  client.powerOn.mockResolvedValue(undefined);
  client.powerOff.mockResolvedValue(undefined);
  client.setTargetTemperature.mockResolvedValue(undefined);
  return client;
}

export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => {
  };

  reject: (reason: unknown) => void = () => {
  };

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

export function quietLogger(prefix: string): Logging {
  const log = Logger.withPrefix(prefix);
  jest.spyOn(log, 'info').mockImplementation(() => {
  });
  jest.spyOn(log, 'warn').mockImplementation(() => {
  });
  jest.spyOn(log, 'error').mockImplementation(() => {
  });
  return log;
}
