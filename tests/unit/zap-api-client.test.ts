import { ZapApiClient, buildBaseUrl } from '@core/client/ZapApiClient';
import { RemoteOperationError } from '@core/errors';

import { Logger } from '../../src/utils/logger/Logger';
import { ZapStub } from '../helpers/zap-stub';

describe('ZapApiClient', () => {
  let stub: ZapStub;
  let client: ZapApiClient;

  beforeEach(() => {
    stub = new ZapStub();
    client = new ZapApiClient(
      { zapUrl: 'http://127.0.0.1', port: 8090, apiKey: 'test-secret' },
      { adapter: stub.adapter, logger: new Logger({ colorize: false }) }
    );
  });

  it('should combine URL and port into the base URL', () => {
    expect(client.baseUrl).toBe('http://127.0.0.1:8090');
    expect(buildBaseUrl('https://zap.internal/', 443)).toBe('https://zap.internal');
  });

  it('should send the API key and drop undefined params', async () => {
    stub.on('/JSON/spider/action/scan/', { data: { scan: '3' } });

    const result = await client.action('spider', 'scan', { url: 'http://example.com', contextName: undefined });

    expect(result).toEqual({ scan: '3' });
    expect(stub.requests).toEqual([
      { path: '/JSON/spider/action/scan/', params: { url: 'http://example.com' }, apiKey: 'test-secret' },
    ]);
  });

  it('should turn API error bodies into remote errors', async () => {
    stub.on('/JSON/core/action/accessUrl/', {
      status: 400,
      data: { code: 'url_not_found', message: 'URL Not Found in the Scan Tree' },
    });

    await expect(client.action('core', 'accessUrl', { url: 'http://x' })).rejects.toThrow(
      'ZAP API error for core.accessUrl: URL Not Found in the Scan Tree'
    );
  });

  it('should report an unreachable daemon as a remote error', async () => {
    stub.down = true;

    await expect(client.view('core', 'alerts')).rejects.toBeInstanceOf(RemoteOperationError);
  });

  it('should return text from OTHER endpoints', async () => {
    stub.on('/OTHER/core/other/mdreport/', { data: '# ZAP Scanning Report' });

    await expect(client.other('core', 'mdreport')).resolves.toBe('# ZAP Scanning Report');
  });

  describe('ping', () => {
    it('should report the version when ZAP answers', async () => {
      stub.on('/JSON/core/view/version/', { data: { version: '2.15.0' } });
      await expect(client.ping()).resolves.toEqual({ reachable: true, version: '2.15.0' });
    });

    it('should report unreachable when nothing listens', async () => {
      stub.down = true;
      await expect(client.ping()).resolves.toEqual({ reachable: false });
    });

    it('should refuse another service on the port', async () => {
      stub.on('/JSON/core/view/version/', { data: '<html>hello</html>' });
      await expect(client.ping()).rejects.toThrow('Another process is listening on http://127.0.0.1:8090');
    });

    it('should treat an API key rejection as a running ZAP', async () => {
      stub.on('/JSON/core/view/version/', {
        status: 400,
        data: { code: 'bad_api_key', message: 'Missing or invalid API key' },
      });

      await expect(client.ping()).resolves.toEqual({ reachable: true, apiError: 'Missing or invalid API key' });
    });

    it('should fall back to the error code when ZAP gives no message', async () => {
      stub.on('/JSON/core/view/version/', { status: 400, data: { code: 'bad_api_key' } });
      await expect(client.ping()).resolves.toEqual({ reachable: true, apiError: 'bad_api_key' });
    });
  });
});
