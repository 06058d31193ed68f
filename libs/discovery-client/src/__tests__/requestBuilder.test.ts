import { describe, expect, it } from 'vitest';
import { BadArgumentError } from '../errors';
import { resolveMethod } from '../methodTree';
import { bindArguments, expandPath } from '../requestBuilder';
import { loadWidgetsDocument } from './fixtures';

const document = loadWidgetsDocument();
const list = resolveMethod(document, 'projects.widgets.list');
const create = resolveMethod(document, 'projects.widgets.create');
const get = resolveMethod(document, 'projects.widgets.get');
const search = resolveMethod(document, 'projects.widgets.search');

const captureBadArgument = (run: () => unknown): BadArgumentError => {
  try {
    run();
  } catch (error) {
    if (error instanceof BadArgumentError) return error;
    throw error;
  }
  throw new Error('expected a BadArgumentError');
};

describe('bindArguments', () => {
  it('builds the request for a list call', () => {
    const bound = bindArguments(
      list,
      {
        parent: 'projects/p-1',
        pageSize: 50,
        labels: ['red', 'blue'],
        view: 'FULL',
        createdAfter: new Date(Date.UTC(2024, 2, 5, 13, 30)),
      },
      { auth: 'service', key: 'test-key', headers: { 'X-Trace': 't-1' } },
    );

    expect(bound.request).toEqual({
      method: 'GET',
      urlParts: { baseUrl: 'https://widgets.example.test/', path: 'v1/projects/p-1/widgets' },
      query: { pageSize: 50, labels: ['red', 'blue'], view: 'FULL', createdAfter: '2024-03-05', key: 'test-key' },
      body: undefined,
      headers: { 'X-Trace': 't-1' },
      operation: 'widgets.projects.widgets.list',
      auth: 'service',
      timeoutMs: undefined,
    });
    expect(bound.args.createdAfter).toBe('2024-03-05');
  });

  it('keeps an explicit key argument over the default one', () => {
    const bound = bindArguments(list, { parent: 'projects/p-1', key: 'arg-key' }, { key: 'test-key' });
    expect(bound.request.query).toEqual({ key: 'arg-key' });
  });

  it('sends the body with binary values base64 encoded and dates as timestamps', () => {
    const bound = bindArguments(create, {
      parent: 'projects/p-1',
      widgetId: 'w-1',
      body: { id: 'w-1', blob: Buffer.from('hi'), seenAt: new Date(Date.UTC(2024, 0, 1)) },
    });

    expect(bound.request.method).toBe('POST');
    expect(bound.request.query).toEqual({ widgetId: 'w-1' });
    expect(bound.request.body).toEqual({ id: 'w-1', blob: 'aGk=', seenAt: '2024-01-01T00:00:00.000Z' });
  });

  it('sends body dates in the format their request fields declare', () => {
    const day = new Date(Date.UTC(2024, 0, 2, 15, 30));

    const bound = bindArguments(search, {
      parent: 'projects/p-1',
      body: {
        createdOn: day,
        seenAfter: day,
        window: { start: day, end: day },
        days: [day, new Date(Date.UTC(2024, 0, 3))],
        refine: { createdOn: day, query: 'red' },
        extra: day,
      },
    });

    expect(bound.request.body).toEqual({
      createdOn: '2024-01-02',
      seenAfter: '2024-01-02T15:30:00.000Z',
      window: { start: '2024-01-02', end: '2024-01-02T15:30:00.000Z' },
      days: ['2024-01-02', '2024-01-03'],
      refine: { createdOn: '2024-01-02', query: 'red' },
      extra: '2024-01-02T15:30:00.000Z',
    });
  });

  it('accepts whole numbers for 64-bit integer strings', () => {
    const bound = bindArguments(list, { parent: 'projects/p-1', minCount: 12 });
    expect(bound.request.query).toEqual({ minCount: '12' });
  });

  it('hints that identifiers are strings', () => {
    const failure = captureBadArgument(() => bindArguments(get, { name: 1234 }));

    expect(failure.parameter).toBe('name');
    expect(failure.hint).toBe('Identifiers are passed as strings: use "1234" instead of 1234.');
  });

  it('suggests the right spelling of an unknown parameter', () => {
    const failure = captureBadArgument(() => bindArguments(list, { parent: 'projects/p-1', page_size: 10 }));
    expect(failure.message).toBe('Bad argument "page_size": unknown parameter. Did you mean "pageSize"?');
  });

  it('lists accepted parameters when nothing is close', () => {
    const failure = captureBadArgument(() => bindArguments(create, { parent: 'projects/p-1', colour: 'red' }));
    expect(failure.hint).toBe('"projects.widgets.create" accepts: body, parent, widgetId.');
  });

  it('rejects missing required parameters', () => {
    const failure = captureBadArgument(() => bindArguments(list, { pageSize: 10 }));

    expect(failure.parameter).toBe('parent');
    expect(failure.message).toBe(
      'Bad argument "parent": missing required path parameter. "projects.widgets.list" takes parent in that order.',
    );
  });

  it('rejects values outside an enum', () => {
    const failure = captureBadArgument(() => bindArguments(list, { parent: 'projects/p-1', view: 'PARTIAL' }));
    expect(failure.hint).toBe('Use one of: BASIC, FULL.');
  });

  it('rejects a body for methods without a request', () => {
    expect(captureBadArgument(() => bindArguments(get, { name: 'w', body: {} })).parameter).toBe('body');
  });

  it('rejects lists for single-valued parameters', () => {
    const failure = captureBadArgument(() => bindArguments(list, { parent: 'projects/p-1', view: ['BASIC'] }));
    expect(failure.hint).toBe('Pass one value.');
  });

  it('rejects fractional integers', () => {
    expect(captureBadArgument(() => bindArguments(list, { parent: 'p', pageSize: 1.5 })).message).toBe(
      'Bad argument "pageSize": expected integer but got number 1.5. Check the value passed for "pageSize".',
    );
  });
});

describe('expandPath', () => {
  it('escapes simple placeholders and keeps slashes in reserved ones', () => {
    expect(expandPath('v1/{+name}/items/{itemId}', { name: 'projects/p 1', itemId: 'a/b' })).toBe(
      'v1/projects/p%201/items/a%2Fb',
    );
  });
});
