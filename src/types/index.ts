/**
 * Central export point for all type definitions
 */

export * from './enums';
export type { Alert, AlertSummary } from './alert';
export type { ZapConnectionConfig, ScanIdentity, QuickScanInput, QuickScanPlan } from './config';
export type { RunOutcome } from './run';
