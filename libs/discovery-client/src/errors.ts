/**
 * A dot path did not lead to a method. `validSegments` lists what could have
 * followed the last segment that did resolve.
 */
export class MethodNotFoundError extends Error {
  readonly path: string;
  readonly failedSegment: string;
  readonly validSegments: string[];

  constructor(path: string, failedSegment: string, validSegments: string[]) {
    const hint = validSegments.length > 0 ? ` Valid segments here: ${validSegments.join(', ')}.` : '';
    super(`Method "${path}" not found: no "${failedSegment}" at this point.${hint}`);
    this.name = 'MethodNotFoundError';
    this.path = path;
    this.failedSegment = failedSegment;
    this.validSegments = validSegments;
  }
}

export class BadArgumentError extends Error {
  readonly parameter: string;
  readonly hint: string;

  constructor(parameter: string, problem: string, hint: string) {
    super(`Bad argument "${parameter}": ${problem}. ${hint}`);
    this.name = 'BadArgumentError';
    this.parameter = parameter;
    this.hint = hint;
  }
}

export class DocumentLoadError extends Error {
  readonly service: string;
  readonly version: string;

  constructor(service: string, version: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot load interface document for ${service} ${version}: ${message}`, options);
    this.name = 'DocumentLoadError';
    this.service = service;
    this.version = version;
  }
}

export class UploadError extends Error {
  readonly operation?: string;

  constructor(message: string, operation?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UploadError';
    this.operation = operation;
  }
}
