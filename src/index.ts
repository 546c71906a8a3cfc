export { SelfOrganizingList } from "./self-organizing-list";
export type { ListDebug } from "./self-organizing-list";
export { STRATEGIES, STRATEGY_KINDS, isStrategyKind, parseStrategy } from "./strategies";
export type { StrategyKind, StrategyInfo } from "./strategies";
export { MetricsRecorder } from "./metrics";
export type { OperationLabel } from "./metrics";
export { ReadWriteLock } from "./rw-lock";
export { InvalidConfigurationError } from "./errors";
export type { ConfigurationField } from "./errors";
export { formatReport } from "./report";
export { PerfTimeSource } from "./monotone-time";
export type { TimeSource } from "./monotone-time";
export type {
    EvictReason,
    ListKey,
    PerformanceReport,
    SearchResult,
    SelfOrganizingListOptions,
} from "./types";
