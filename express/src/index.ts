export type { FailOptions, FailureEnvelope, SuccessEnvelope } from './middleware/responseEnvelope.js';
export { responseEnvelope } from './middleware/responseEnvelope.js';
export type { ListHandler, ListHandlerOptions } from './handlers/list.js';
export { createListHandler } from './handlers/list.js';
export type { ListRouterDeps } from './routers/list.js';
export { createListRouter } from './routers/list.js';
export type { ExpressAppOptions } from './http/createExpressApp.js';
export { createExpressApp } from './http/createExpressApp.js';
