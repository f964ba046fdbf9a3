import axios, {AxiosInstance, AxiosResponse} from 'axios';
import {Logging} from 'homebridge';
import {ConnectivityError} from './errors.js';
import {validateTargetTemperature} from './limits.js';

const HEATER_ENDPOINT = '/v1/heater';
const REQUEST_TIMEOUT_MS = 5000;

export type DeviceEndpoint = Readonly<{
  host: string;
  authToken: string;
}>;

export type DeviceStatus = Readonly<{
  isOn: boolean;
  currentTemperature: number;
  targetTemperature: number;
}>;

// Wire shape of GET /v1/heater
type HeaterResponse = {
  power: 'on' | 'off';
  temperature: number;
  target_temperature: number;
};

type HeaterPatch =
  | {power: 'on' | 'off'}
  | {target_temperature: number};

export interface HeaterClient {
  getStatus(signal?: AbortSignal): Promise<DeviceStatus>;

  powerOn(): Promise<void>;

  powerOff(): Promise<void>;

  setTargetTemperature(celsius: number): Promise<void>;
}

export function newDeviceEndpoint(host: string, authToken: string): DeviceEndpoint {
  return Object.freeze({host, authToken});
}

export function baseURLFor(host: string): string {
  return /^https?:\/\//.test(host) ? host : `http://${host}`;
}

function isHeaterResponse(data: unknown): data is HeaterResponse {
  if (typeof data !== 'object' || data === null) {
    return false;
  }
  return 'power' in data && (data.power === 'on' || data.power === 'off') &&
    'temperature' in data && typeof data.temperature === 'number' &&
    'target_temperature' in data && typeof data.target_temperature === 'number';
}

export class Client implements HeaterClient {
  readonly endpoint: DeviceEndpoint;
  private readonly axiosClient: AxiosInstance;
  private readonly log?: Logging;

  constructor(endpoint: DeviceEndpoint, log?: Logging) {
    this.endpoint = endpoint;
    this.axiosClient = axios.create({
      baseURL: baseURLFor(endpoint.host),
      timeout: REQUEST_TIMEOUT_MS,
    });
    this.log = log;
  }

  headers(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.endpoint.authToken}`,
    };
  }

  private logResponse<T>(response: AxiosResponse<T>, method: string): void {
    this.log?.debug(`API ${method} ${HEATER_ENDPOINT} - Response Code: ${response.status}`);
  }

  private handleError(error: unknown, method: string): never {
    if (axios.isCancel(error)) {
      this.log?.debug(`API ${method} ${HEATER_ENDPOINT} - request aborted`);
      throw new ConnectivityError('request aborted', undefined, {cause: error});
    }
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === undefined) {
        // no response at all: refused, reset, timed out
        this.log?.error(`API ${method} ${HEATER_ENDPOINT} - ${error.code ?? 'no response'}: ${error.message}`);
        throw new ConnectivityError(`heater at ${this.endpoint.host} is unreachable (${error.message})`, undefined, {cause: error});
      }
      const statusText = error.response?.statusText || 'Unknown error';
      if (status === 401 || status === 403) {
        this.log?.error(`API ${method} ${HEATER_ENDPOINT} - Error ${status}: the token was rejected`);
      } else {
        this.log?.error(`API ${method} ${HEATER_ENDPOINT} - Error ${status}: ${statusText}`);
      }
      throw new ConnectivityError(`API error ${status}: ${statusText}`, status, {cause: error});
    }
    const message = error instanceof Error ? error.message : String(error);
    this.log?.error(`API ${method} ${HEATER_ENDPOINT} - Unexpected error: ${message}`);
    throw new ConnectivityError(`API error: ${message}`, undefined, {cause: error});
  }

  async getStatus(signal?: AbortSignal): Promise<DeviceStatus> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosClient.get<unknown>(HEATER_ENDPOINT, {headers: this.headers(), signal});
      this.logResponse(response, 'GET');
    } catch (error) {
      this.handleError(error, 'GET');
    }
    const data = response.data;
    if (!isHeaterResponse(data)) {
      this.log?.debug(`API GET ${HEATER_ENDPOINT} - unexpected body: ${JSON.stringify(data)}`);
      throw new ConnectivityError('heater returned a malformed status', response.status);
    }
    return Object.freeze({
      isOn: data.power === 'on',
      currentTemperature: data.temperature,
      targetTemperature: data.target_temperature,
    });
  }

  powerOn(): Promise<void> {
    return this.patch({power: 'on'});
  }

  powerOff(): Promise<void> {
    return this.patch({power: 'off'});
  }

  async setTargetTemperature(celsius: number): Promise<void> {
    validateTargetTemperature(celsius);
    return this.patch({target_temperature: celsius});
  }

  private async patch(body: HeaterPatch): Promise<void> {
    try {
      const response = await this.axiosClient.patch(HEATER_ENDPOINT, body, {headers: this.headers()});
      this.logResponse(response, 'PATCH');
    } catch (error) {
      this.handleError(error, 'PATCH');
    }
  }
}
