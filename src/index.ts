// src/index.ts
// Public exports for the library.

export * from "./client/DialogClient";
export * from "./dialogs/Dialog";
export * from "./dialogs/DialogIterator";
export * from "./dialogs/EntitySet";
export * from "./dialogs/MessageSet";
export * from "./dialogs/deleteDialog";
export * from "./dialogs/offsets";
export * from "./iter/IterBuffer";
export * from "./transports/Transport";
export * from "./transports/HttpGatewayTransport";
export * from "./transports/resilience";
export * from "./transports/validation";
export * from "./config/env";
export * from "./errors";
export * from "./types";
export * from "./tl/types";
