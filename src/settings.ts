/**
 * Name users put under "platform" in the Homebridge config.json
 */
export const PLATFORM_NAME = 'LanHeater';

/**
 * Must match the name in package.json
 */
export const PLUGIN_NAME = 'homebridge-lan-heater';
