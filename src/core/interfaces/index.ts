/**
 * Core interfaces for the ZAP client layer
 */

export type { IScanClient, IScanPolicyClient, IZapClient, ScannerInfo, PolicyInfo } from './IScanClient';
