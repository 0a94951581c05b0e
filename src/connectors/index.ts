export { LocalConnector } from './local.js';
export { HttpConnector, HttpError } from './http.js';
export type { Connector, TileResponse } from './connector.js';
export type { HttpConnectorOptions } from './http.js';
