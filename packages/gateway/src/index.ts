export { parseInbound, envelopes } from "./protocol.js";
export type { InboundEnvelope, OutboundEnvelope, ThoughtView } from "./protocol.js";
export {
  ConnectionHandler,
  GENERIC_FAILURE_MESSAGE,
  TOOL_LIMIT_MESSAGE,
} from "./connection-handler.js";
export type { ConnectionPhase, ConnectionTransport, ConnectionHandlerOptions } from "./connection-handler.js";
export { AgentGatewayServer } from "./server.js";
export type { GatewayServerOptions } from "./server.js";
export { loadAgendaConfig, DEFAULT_CONFIG_FILE } from "./config.js";
export type { AgendaConfig, LoadConfigOptions } from "./config.js";
