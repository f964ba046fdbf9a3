import {Logging} from 'homebridge';
import {HeaterClient} from './heater/client.js';
import {validateTargetTemperature} from './heater/limits.js';
import {PollingController} from './pollingController.js';

export class CommandHandler {
  constructor(
    private readonly client: HeaterClient,
    private readonly controller: PollingController,
    private readonly log: Logging,
  ) {
  }

  // The refresh runs even when the command fails: the heater may have
  // switched despite the error response.
  async requestPowerMode(on: boolean): Promise<void> {
    const {name} = this.controller;
    this.log.info(`${name}: turning ${on ? 'on' : 'off'}`);
    try {
      if (on) {
        await this.client.powerOn();
      } else {
        await this.client.powerOff();
      }
    } finally {
      await this.controller.requestRefresh();
    }
  }

  async requestTargetTemperature(celsius: number): Promise<void> {
    validateTargetTemperature(celsius);
    const {name} = this.controller;
    this.log.info(`${name}: setting target temperature to ${celsius}°C`);
    try {
      await this.client.setTargetTemperature(celsius);
    } finally {
      await this.controller.requestRefresh();
    }
  }
}
