export { HttpServer } from './server.js'
export type { HttpServerConfig } from './server.js'
export type { HttpContext } from './handlers.js'
