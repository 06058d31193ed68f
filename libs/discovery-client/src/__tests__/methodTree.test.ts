import { describe, expect, it } from 'vitest';
import { MethodNotFoundError } from '../errors';
import { findMethod, listMethods, resolveMethod } from '../methodTree';
import { loadWidgetsDocument } from './fixtures';

const document = loadWidgetsDocument();

describe('resolveMethod', () => {
  it('walks resources down to the method', () => {
    const resolved = resolveMethod(document, 'projects.widgets.list');

    expect(resolved.name).toBe('list');
    expect(resolved.service).toBe('widgets');
    expect(resolved.version).toBe('v1');
    expect(resolved.method.id).toBe('widgets.projects.widgets.list');
    expect(resolved.method.httpMethod).toBe('GET');
  });

  it('reports the valid resources where a middle segment is wrong', () => {
    const failure = captureNotFound('projects.gadgets.list');

    expect(failure.path).toBe('projects.gadgets.list');
    expect(failure.failedSegment).toBe('gadgets');
    expect(failure.validSegments).toEqual(['widgets']);
  });

  it('reports the valid methods where the last segment is wrong', () => {
    const failure = captureNotFound('projects.widgets.lst');

    expect(failure.failedSegment).toBe('lst');
    expect(failure.validSegments).toEqual(['create', 'delete', 'get', 'import', 'list', 'search']);
    expect(failure.message).toBe(
      'Method "projects.widgets.lst" not found: no "lst" at this point. Valid segments here: create, delete, get, import, list, search.',
    );
  });

  it('does not treat a resource as a method', () => {
    expect(captureNotFound('projects.widgets').validSegments).toEqual(['widgets']);
  });

  it('ignores inherited object keys', () => {
    expect(captureNotFound('constructor.list').validSegments).toEqual(['operations', 'projects']);
  });
});

describe('listMethods', () => {
  it('lists every dot path in the document', () => {
    expect(listMethods(document)).toEqual([
      'operations.get',
      'projects.widgets.create',
      'projects.widgets.delete',
      'projects.widgets.get',
      'projects.widgets.import',
      'projects.widgets.list',
      'projects.widgets.search',
    ]);
  });
});

function captureNotFound(path: string): MethodNotFoundError {
  try {
    findMethod(document, path);
  } catch (error) {
    if (error instanceof MethodNotFoundError) return error;
    throw error;
  }
  throw new Error(`expected ${path} to be missing`);
}
