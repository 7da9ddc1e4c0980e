export type {
	Frame,
	CloseInfo,
	ConnectOptions,
	TransportConnection,
	TransportConnector,
} from "./types.js";
export { ABNORMAL_CLOSURE, NORMAL_CLOSURE } from "./types.js";
export { WsTransport, createWsConnector, wsConnector } from "./client.js";
export type { WsTransportOptions } from "./client.js";
