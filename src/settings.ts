// src/settings.ts

/**
 * Name the platform is registered under; must match "platform" in config.json.
 */
export const PLATFORM_NAME = 'TermoWebPlatform';

/**
 * Must match the "name" field in package.json.
 */
export const PLUGIN_NAME = 'homebridge-termoweb';
