/**
 * zapctl
 * Command line front end and client library for the OWASP ZAP daemon
 *
 * @packageDocumentation
 */

export * from './types';
export * from './core/interfaces';
export * from './core/errors';

export { ZapApiClient, buildBaseUrl } from './core/client/ZapApiClient';
export { ZapController } from './core/client/ZapController';
export { ZapDaemon } from './core/daemon/ZapDaemon';
export { ReadinessPoller, systemClock, type Clock } from './core/daemon/ReadinessPoller';
export { ConfigurationManager, DEFAULT_CONNECTION_CONFIG } from './core/config/ConfigurationManager';
export { ScanOrchestrator, plannedStages } from './core/engine/ScanOrchestrator';
export { resolveQuickScanPlan } from './core/engine/QuickScanPlan';
export { exitCodeForAlerts, exitCodeForError } from './core/policy/ExitCodePolicy';

export { AlertReporter, filterAlerts, summarizeAlerts } from './reporters/AlertReporter';
export { ReportWriter } from './reporters/ReportWriter';

export { Logger, createLogger } from './utils/logger/Logger';
export { SCANNER_GROUPS, ALL_SCANNER_IDS, resolveScannerSelection } from './utils/scanners/scanner-groups';

export { createProgram } from './cli/program';
