import {Service} from 'homebridge';
import {HeaterPlatformAccessory} from '../platformAccessory.js';
import {MAX_TARGET_TEMPERATURE, MIN_TARGET_TEMPERATURE} from '../heater/limits.js';
import {ControllerState} from '../pollingController.js';
import {NewMapper} from './thermostatMapper.js';
import {newSetters} from './setters.js';

export function createThermostatService(heaterAccessory: HeaterPlatformAccessory): Service {
  const {platform, accessory, endpoint} = heaterAccessory;
  const {Characteristic} = platform;
  const thermostatMapper = NewMapper(Characteristic);
  const thermostatService = accessory.getService(platform.Service.Thermostat) ||
    accessory.addService(platform.Service.Thermostat, accessory.displayName);
  const setters = newSetters(heaterAccessory);
  const lastStatus = () => endpoint.getState().lastStatus;

  thermostatService.getCharacteristic(Characteristic.CurrentHeatingCoolingState)
    .onGet(() => {
      const status = lastStatus();
      return status ? thermostatMapper.toCurrentHeatingCoolingState(status) : null;
    });

  const {OFF, HEAT} = Characteristic.TargetHeatingCoolingState;
  thermostatService.getCharacteristic(Characteristic.TargetHeatingCoolingState)
    .setProps({validValues: [OFF, HEAT]})
    .onGet(() => {
      const status = lastStatus();
      return status ? thermostatMapper.toTargetHeatingCoolingState(status) : null;
    })
    .onSet(setters.setTargetState);

  thermostatService.getCharacteristic(Characteristic.CurrentTemperature)
    .onGet(() => lastStatus()?.currentTemperature ?? null);

  thermostatService.getCharacteristic(Characteristic.TargetTemperature)
    .setProps({
      minValue: MIN_TARGET_TEMPERATURE,
      maxValue: MAX_TARGET_TEMPERATURE,
      minStep: 0.5,
    })
    .onGet(() => lastStatus()?.targetTemperature ?? null)
    .onSet(setters.setTargetTemp);

  thermostatService.getCharacteristic(Characteristic.TemperatureDisplayUnits)
    .setProps({validValues: [Characteristic.TemperatureDisplayUnits.CELSIUS]})
    .onGet(() => Characteristic.TemperatureDisplayUnits.CELSIUS);

  endpoint.subscribe((state: ControllerState) => {
    const status = state.lastStatus;
    if (!status) {
      return;
    }
    thermostatService.updateCharacteristic(Characteristic.CurrentHeatingCoolingState,
      thermostatMapper.toCurrentHeatingCoolingState(status));
    thermostatService.updateCharacteristic(Characteristic.TargetHeatingCoolingState,
      thermostatMapper.toTargetHeatingCoolingState(status));
    thermostatService.updateCharacteristic(Characteristic.CurrentTemperature, status.currentTemperature);
    thermostatService.updateCharacteristic(Characteristic.TargetTemperature, status.targetTemperature);
  });

  return thermostatService;
}
