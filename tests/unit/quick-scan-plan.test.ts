import {
  DAEMON_STARTUP_TIMEOUT,
  resolveAlertRisk,
  resolveIdentity,
  resolveOutputFormat,
  resolveQuickScanPlan,
  validateExclusion,
} from '@core/engine/QuickScanPlan';
import { UsageError } from '@core/errors';

import { AlertOutputFormat, AlertRisk } from '../../src/types/enums';

describe('resolveQuickScanPlan', () => {
  it('should apply defaults', () => {
    const plan = resolveQuickScanPlan({ target: 'http://example.com' });

    expect(plan).toEqual({
      target: 'http://example.com',
      selfContained: false,
      startOptions: undefined,
      startupTimeout: DAEMON_STARTUP_TIMEOUT,
      scannerIds: undefined,
      exclude: undefined,
      spider: false,
      ajaxSpider: false,
      recursive: false,
      identity: undefined,
      minRisk: AlertRisk.HIGH,
      outputFormat: AlertOutputFormat.TABLE,
      softFail: false,
    });
  });

  it('should expand scanner groups into ids', () => {
    const plan = resolveQuickScanPlan({ target: 'http://example.com', scanners: 'xss_reflected,sqli,6' });
    expect(plan.scannerIds).toEqual(new Set(['40012', '40018', '6']));
  });

  it('should reject an unknown scanner group', () => {
    expect(() => resolveQuickScanPlan({ target: 'http://example.com', scanners: 'bogus' })).toThrow(UsageError);
  });

  it('should reject a user name without a context', () => {
    expect(() => resolveQuickScanPlan({ target: 'http://example.com', userName: 'alice' })).toThrow(
      'A user name can only be used together with a context name (--context-name)'
    );
  });

  it('should carry the identity when both names are given', () => {
    const plan = resolveQuickScanPlan({ target: 'http://example.com', contextName: 'app', userName: 'alice' });
    expect(plan.identity).toEqual({ contextName: 'app', userName: 'alice' });
  });
});

describe('resolveIdentity', () => {
  it('should return nothing without a context', () => {
    expect(resolveIdentity()).toBeUndefined();
  });

  it('should allow a context on its own', () => {
    expect(resolveIdentity('app')).toEqual({ contextName: 'app' });
  });
});

describe('resolveAlertRisk', () => {
  it('should default to High', () => {
    expect(resolveAlertRisk()).toBe(AlertRisk.HIGH);
  });

  it('should ignore case', () => {
    expect(resolveAlertRisk('medium')).toBe(AlertRisk.MEDIUM);
  });

  it('should reject an unknown level', () => {
    expect(() => resolveAlertRisk('Critical')).toThrow(
      'Invalid alert level "Critical". Expected one of: Informational, Low, Medium, High'
    );
  });
});

describe('resolveOutputFormat', () => {
  it('should accept json', () => {
    expect(resolveOutputFormat('JSON')).toBe(AlertOutputFormat.JSON);
  });

  it('should reject xml', () => {
    expect(() => resolveOutputFormat('xml')).toThrow(UsageError);
  });
});

describe('validateExclusion', () => {
  it('should pass a valid pattern through', () => {
    expect(validateExclusion('.*logout.*')).toBe('.*logout.*');
  });

  it('should reject an invalid pattern', () => {
    expect(() => validateExclusion('([a-z')).toThrow('Invalid regular expression: ([a-z');
  });
});
