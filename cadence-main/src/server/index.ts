export { WsServer } from "./ws-server.js";
export type { WsServerOptions, ClientTransport } from "./ws-server.js";
export { parseClientMessage } from "./protocol.js";
export type * from "./protocol.js";
