export * from "./core/GatewayClient";
export * from "./types/Protocol";
export * from "./util/LoggerCommon";
