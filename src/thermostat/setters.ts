import {CharacteristicValue} from 'homebridge';
import {HeaterPlatformAccessory} from '../platformAccessory.js';
import {ValidationError} from '../heater/errors.js';
import {NewMapper} from './thermostatMapper.js';

interface Setters {
  setTargetState(value: CharacteristicValue): Promise<void>

  setTargetTemp(value: CharacteristicValue): Promise<void>
}

export function newSetters(heaterAccessory: HeaterPlatformAccessory): Setters {
  const {platform, endpoint, displayName} = heaterAccessory;
  const mapper = NewMapper(platform.Characteristic);
  return {
    setTargetState: async (value: CharacteristicValue) => {
      const on = typeof value === 'number' ? mapper.toPowerMode(value) : null;
      if (on === null) {
        platform.log.error(`${displayName}: unsupported heating mode ${String(value)}`);
        return;
      }
      platform.log(`setting TargetHeatingCoolingState for ${displayName} to ${on ? 'heat' : 'off'} (${value})`);
      await endpoint.setPower(on);
    },
    setTargetTemp: async (value: CharacteristicValue) => {
      if (typeof value !== 'number') {
        throw new ValidationError(`target temperature must be a number, got ${String(value)}`);
      }
      platform.log(`setting TargetTemperature for ${displayName} to ${value}°C`);
      await endpoint.setTargetTemperature(value);
    },
  };
}
