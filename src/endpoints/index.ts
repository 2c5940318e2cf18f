// src/endpoints/index.ts
export const ENDPOINT_HOSTS = Object.freeze({
  'ovh-ca': 'ca.api.ovh.com',                // OVH North America
  'ovh-eu': 'eu.api.ovh.com',                // OVH Europe
  'ovh-us': 'us.api.ovh.com',                // OVH US
  'soyoustart-ca': 'ca.api.soyoustart.com',  // So you Start North America
  'soyoustart-eu': 'eu.api.soyoustart.com',  // So you Start Europe
  'kimsufi-ca': 'ca.api.kimsufi.com',        // Kimsufi North America
  'kimsufi-eu': 'eu.api.kimsufi.com',        // Kimsufi Europe
} as const);

export type Endpoint = keyof typeof ENDPOINT_HOSTS;

export const DEFAULT_HOST = 'api.ovh.com';

export function isKnownEndpoint(value: string): value is Endpoint {
  return Object.prototype.hasOwnProperty.call(ENDPOINT_HOSTS, value);
}

/** Maps an endpoint id to its API host, falling back to {@link DEFAULT_HOST}. */
export function resolveHost(endpoint: string): string {
  return isKnownEndpoint(endpoint) ? ENDPOINT_HOSTS[endpoint] : DEFAULT_HOST;
}
