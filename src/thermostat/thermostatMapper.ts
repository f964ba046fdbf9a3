import {Characteristic} from 'homebridge';
import {DeviceStatus} from '../heater/client.js';

interface Mapper {
  toCurrentHeatingCoolingState: (status: DeviceStatus) => number;
  toTargetHeatingCoolingState: (status: DeviceStatus) => number;
  toPowerMode: (targetState: number) => boolean | null;
}

class RealMapper implements Mapper {
  constructor(readonly characteristic: typeof Characteristic) {
  }

  toCurrentHeatingCoolingState(status: DeviceStatus): number {
    const {OFF, HEAT} = this.characteristic.CurrentHeatingCoolingState;
    if (!status.isOn) {
      return OFF;
    }
    return status.currentTemperature < status.targetTemperature ? HEAT : OFF;
  }

  toTargetHeatingCoolingState(status: DeviceStatus): number {
    const {OFF, HEAT} = this.characteristic.TargetHeatingCoolingState;
    return status.isOn ? HEAT : OFF;
  }

  // null: a mode the heater has no equivalent for
  toPowerMode(targetState: number): boolean | null {
    const {OFF, HEAT} = this.characteristic.TargetHeatingCoolingState;
    if (targetState === OFF) {
      return false;
    }
    if (targetState === HEAT) {
      return true;
    }
    return null;
  }
}

export function NewMapper(characteristic: typeof Characteristic): Mapper {
  return new RealMapper(characteristic);
}
