import { AlertReporter, filterAlerts, summarizeAlerts } from '@reporters/AlertReporter';
import { TableAlertFormatter } from '@reporters/TableAlertFormatter';

import { ALERT_RISK_RANK, AlertOutputFormat, AlertRisk } from '../../src/types/enums';
import { MemoryOutput, makeAlert } from '../helpers/fakes';

const xss = makeAlert({ id: '1', name: 'XSS', risk: AlertRisk.HIGH, cweId: '79', url: 'http://a/' });
const cookie = makeAlert({ id: '2', name: 'Cookie Without Secure Flag', risk: AlertRisk.LOW, cweId: '614' });
const sqli = makeAlert({ id: '3', name: 'SQL Injection', risk: AlertRisk.HIGH, cweId: '89', url: 'http://a/b' });
const banner = makeAlert({ id: '4', name: 'Server Leaks Version', risk: AlertRisk.INFORMATIONAL, cweId: '200' });
const csp = makeAlert({ id: '5', name: 'CSP Header Not Set', risk: AlertRisk.MEDIUM, cweId: '693' });

const mixed = [xss, cookie, sqli, banner, csp];

describe('filterAlerts', () => {
  it.each(Object.values(AlertRisk))('should never return an alert below %s', (threshold) => {
    const result = filterAlerts(mixed, threshold);
    result.forEach((alert) => {
      expect(ALERT_RISK_RANK[alert.risk]).toBeGreaterThanOrEqual(ALERT_RISK_RANK[threshold]);
    });
  });

  it('should keep the input order', () => {
    expect(filterAlerts(mixed, AlertRisk.LOW).map((a) => a.id)).toEqual(['1', '2', '3', '5']);
  });

  it('should keep everything at Informational', () => {
    expect(filterAlerts(mixed, AlertRisk.INFORMATIONAL)).toEqual(mixed);
  });

  it('should not modify the input', () => {
    const input = [...mixed];
    filterAlerts(input, AlertRisk.HIGH);
    expect(input).toEqual(mixed);
  });
});

describe('summarizeAlerts', () => {
  it('should count alerts per risk', () => {
    expect(summarizeAlerts(mixed)).toEqual({
      Informational: 1,
      Low: 1,
      Medium: 1,
      High: 2,
      total: 5,
    });
  });
});

describe('AlertReporter', () => {
  let output: MemoryOutput;
  let reporter: AlertReporter;

  beforeEach(() => {
    output = new MemoryOutput();
    reporter = new AlertReporter(output, { colorize: false });
  });

  it('should print a grid of the qualifying alerts', () => {
    const reported = reporter.report(mixed, AlertRisk.HIGH, AlertOutputFormat.TABLE);

    expect(reported).toEqual([xss, sqli]);
    expect(output.text.split('\n')).toEqual([
      'Issues found: 2',
      '+---------------+------+--------+------------+',
      '| Alert         | Risk | CWE ID | URL        |',
      '+===============+======+========+============+',
      '| XSS           | High | 79     | http://a/  |',
      '+---------------+------+--------+------------+',
      '| SQL Injection | High | 89     | http://a/b |',
      '+---------------+------+--------+------------+',
      '',
    ]);
  });

  it('should print only the count when nothing qualifies', () => {
    reporter.report([cookie], AlertRisk.HIGH, AlertOutputFormat.TABLE);
    expect(output.text).toBe('Issues found: 0\n');
  });

  it('should print the same alerts as JSON', () => {
    reporter.report(mixed, AlertRisk.HIGH, AlertOutputFormat.JSON);

    const parsed: unknown = JSON.parse(output.text);
    expect(parsed).toEqual([
      {
        id: '1',
        pluginId: '40012',
        name: 'XSS',
        risk: 'High',
        confidence: 'Medium',
        url: 'http://a/',
        cweId: '79',
      },
      {
        id: '3',
        pluginId: '40012',
        name: 'SQL Injection',
        risk: 'High',
        confidence: 'Medium',
        url: 'http://a/b',
        cweId: '89',
      },
    ]);
  });

  it('should include the same alerts whatever the format', () => {
    const asTable = reporter.report(mixed, AlertRisk.MEDIUM, AlertOutputFormat.TABLE);
    const asJson = reporter.report(mixed, AlertRisk.MEDIUM, AlertOutputFormat.JSON);
    expect(asJson).toEqual(asTable);
  });
});

describe('TableAlertFormatter', () => {
  it('should colour the risk column without changing the layout', () => {
    const plain = new TableAlertFormatter({ colorize: false }).render([xss]);
    const coloured = new TableAlertFormatter({ colorize: true }).render([xss]);

    // eslint-disable-next-line no-control-regex
    expect(coloured.replace(/\u001b\[\d+m/g, '')).toBe(plain);
  });
});
