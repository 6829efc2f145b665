export { Coordinator, QueryFailedError, DEFAULT_COORDINATOR_OPTIONS } from "./coordinator.js";
export type { CoordinatorOptions, QueryResult, ReplicaAttempt } from "./coordinator.js";
export { ReplicaTransport } from "./transport.js";
export type { TransportResponse, ReplicaTransportConfig } from "./transport.js";
export { OperatorConsole, parseCommand, formatStatus } from "./operator-console.js";
export type { ConsoleCommand, OperatorConsoleConfig } from "./operator-console.js";
