export * from "./logger";
export * from "./errors";
export * from "./health";
export * from "./address";
export * from "./address_source";
export * from "./tailscale_address_source";
export * from "./clock";
export * from "./config";
export * from "./service";
export * from "./service_directory";
export * from "./transport";
export * from "./http_transport";
export * from "./in_memory_transport";
export * from "./protocol_handler";
export * from "./registry_controller";
export * from "./discovery_client";
export * from "./registry";
export * from "./target";
export * from "./advertise_file";
