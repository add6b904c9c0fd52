export { configLoad } from "./config/configLoad.js";
export { configResolve } from "./config/configResolve.js";
export { configSettingsParse } from "./config/configSettingsParse.js";
export type { Config, ConfigOverrides } from "./config/configTypes.js";
export { ButtonDispatcher } from "./engine/control/buttonDispatcher.js";
export { ControlLoop, type ControlLoopEngine, type ControlLoopOptions } from "./engine/control/controlLoop.js";
export type { ButtonEdges, ControlView, InputPort, RenderPort, UiState } from "./engine/control/controlTypes.js";
export { StatusPoller, type StatusPollerOptions } from "./engine/control/statusPoller.js";
export { JobEngine, type JobEngineOptions } from "./engine/jobs/jobEngine.js";
export type { Job, JobRequest, JobResult, JobSubmit } from "./engine/jobs/jobTypes.js";
export { SessionMachine } from "./engine/session/sessionMachine.js";
export type { SessionOptions, SessionState } from "./engine/session/sessionTypes.js";
export { DomainStore, type DomainSnapshot } from "./engine/state/domainStore.js";
export { getLogger, initLogging } from "./log.js";
export { protocolCommands, protocolStatusCommands } from "./protocol/protocolCommands.js";
export { protocolFieldsSplit } from "./protocol/protocolFieldsSplit.js";
export { protocolKeyedFieldParse } from "./protocol/protocolKeyedFieldParse.js";
export { protocolRecordsSplit } from "./protocol/protocolRecordsSplit.js";
export { protocolRequestPathBuild } from "./protocol/protocolRequestPathBuild.js";
export { protocolStatusParse } from "./protocol/protocolStatusParse.js";
export { protocolTabListParse } from "./protocol/protocolTabListParse.js";
export { protocolTransportParse } from "./protocol/protocolTransportParse.js";
export * from "./protocol/protocolTypes.js";
export { httpTransportCreate } from "./transport/httpTransport.js";
export { networkInterfacesCreate } from "./transport/networkInterfaces.js";
export type { NetworkPort, NetworkStatus, TransportPort, TransportResponse } from "./transport/transportTypes.js";
