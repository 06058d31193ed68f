import { describe, expect, it, vi } from 'vitest';
import { HttpClient, HttpError, type RawHttpResponse, type TransportRequest } from '@discovery-engine/http-core';
import { DiscoveryDocumentLoader, expandTemplate } from '../DocumentLoader';
import { DocumentLoadError } from '../errors';
import { json, widgetsDocumentPath, widgetsDocumentText } from './fixtures';

const templates = [
  'https://{service}.example.test/$discovery/rest?version={version}',
  'https://directory.example.test/apis/{service}/{version}/rest',
];

const createLoader = (...responses: RawHttpResponse[]) => {
  const transport = vi.fn<[TransportRequest, AbortSignal], Promise<RawHttpResponse>>();
  responses.forEach((response) => transport.mockResolvedValueOnce(response));
  const sleep = vi.fn().mockResolvedValue(undefined);
  const loader = new DiscoveryDocumentLoader({
    http: new HttpClient({ transport }),
    urlTemplates: templates,
    directoryUrl: 'https://directory.example.test/apis',
    sleep,
  });
  return { loader, transport, sleep };
};

const notFound: RawHttpResponse = { status: 404, headers: {}, body: '{"error":{"code":404}}' };

describe('DiscoveryDocumentLoader', () => {
  it('falls through to the next template on 404', async () => {
    const { loader, transport } = createLoader(notFound, json(JSON.parse(widgetsDocumentText)));

    const document = await loader.load({ service: 'widgets', version: 'v1', key: 'test-key', labels: 'PREVIEW' });

    expect(document.name).toBe('widgets');
    expect(transport.mock.calls.map(([request]) => request.url)).toEqual([
      'https://widgets.example.test/$discovery/rest?version=v1&key=test-key&labels=PREVIEW',
      'https://directory.example.test/apis/widgets/v1/rest?key=test-key&labels=PREVIEW',
    ]);
  });

  it('raises DocumentLoadError when no template has the document', async () => {
    const { loader } = createLoader(notFound, notFound);

    const failure = loader.load({ service: 'widgets', version: 'v9' });

    await expect(failure).rejects.toBeInstanceOf(DocumentLoadError);
    await expect(failure).rejects.toThrow('Cannot load interface document for widgets v9: not found at any of 2 discovery URLs');
  });

  it('retries transient failures before giving up on a template', async () => {
    const unavailable: RawHttpResponse = { status: 503, headers: {}, body: 'try later' };
    const { loader, transport, sleep } = createLoader(unavailable, json(JSON.parse(widgetsDocumentText)));

    await expect(loader.load({ service: 'widgets', version: 'v1' })).resolves.toMatchObject({ version: 'v1' });
    expect(transport).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(31_000);
  });

  it('wraps fatal failures with the remote body as the cause', async () => {
    const { loader } = createLoader({ status: 403, headers: {}, body: '{"error":{"status":"PERMISSION_DENIED"}}' });

    const failure = await loader.load({ service: 'widgets', version: 'v1' }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(DocumentLoadError);
    if (!(failure instanceof DocumentLoadError)) return;
    expect(failure.cause).toBeInstanceOf(HttpError);
    expect(failure.message).toContain('{"error":{"status":"PERMISSION_DENIED"}}');
  });

  it('parses inline document text without touching the network', async () => {
    const { loader, transport } = createLoader();

    const document = await loader.load({ service: 'widgets', version: 'v1', documentPath: `  ${widgetsDocumentText}` });

    expect(Object.keys(document.schemas)).toEqual(['Widget', 'ListWidgetsResponse', 'SearchWidgetsRequest']);
    expect(transport).not.toHaveBeenCalled();
  });

  it('reads a document file from disk', async () => {
    const { loader } = createLoader();
    const document = await loader.load({ service: 'widgets', version: 'v1', documentPath: widgetsDocumentPath });
    expect(document.rootUrl).toBe('https://widgets.example.test/');
  });

  it('accepts an already parsed document and keeps unknown keys', async () => {
    const { loader } = createLoader();
    const document = await loader.load({
      service: 'widgets',
      version: 'v1',
      document: { name: 'widgets', version: 'v1', rootUrl: 'https://widgets.example.test/', revision: '20240101' },
    });

    expect(document.revision).toBe('20240101');
    expect(document.servicePath).toBe('');
    expect(document.resources).toEqual({});
  });

  it('rejects documents that fail validation', async () => {
    const { loader } = createLoader();

    await expect(loader.load({ service: 'widgets', version: 'v1', document: { name: 'widgets' } })).rejects.toThrow(
      /invalid document \(version: Required; rootUrl: Required\)/,
    );
  });

  it('looks up the preferred version in the directory', async () => {
    const { loader, transport } = createLoader(
      json({ items: [{ name: 'widgets', version: 'v2', preferred: true }] }),
    );

    await expect(loader.preferredVersion('widgets')).resolves.toBe('v2');
    expect(transport.mock.calls[0][0].url).toBe('https://directory.example.test/apis?name=widgets&preferred=true');
  });
});

describe('expandTemplate', () => {
  it('fills every placeholder', () => {
    expect(expandTemplate('https://{service}.test/{service}/{version}', 'a b', 'v1')).toBe('https://a%20b.test/a%20b/v1');
  });
});
