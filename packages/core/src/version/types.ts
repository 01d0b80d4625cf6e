/**
 * Why no upstream version could be determined.
 */
export enum ResolutionFailure {
  NOT_FOUND = 'NOT_FOUND',
  NO_PROJECT_FILTER = 'NO_PROJECT_FILTER',
  NO_FILTERS = 'NO_FILTERS',
  HTTP_STATUS_ERROR = 'HTTP_STATUS_ERROR',
  REQUEST_ERROR = 'REQUEST_ERROR',
}

export const RESOLUTION_FAILURE_MESSAGES: Record<ResolutionFailure, string> = {
  [ResolutionFailure.NOT_FOUND]: 'Not found on repology',
  [ResolutionFailure.NO_PROJECT_FILTER]: 'No project filter found in the pacscript',
  [ResolutionFailure.NO_FILTERS]: 'No repology filters found in the pacscript',
  [ResolutionFailure.HTTP_STATUS_ERROR]: 'HTTP status error',
  [ResolutionFailure.REQUEST_ERROR]: 'Request error',
};

export type Latest =
  | { kind: 'resolved'; version: string }
  | { kind: 'failed'; reason: ResolutionFailure };

export enum VersionStatus {
  UNKNOWN = 'UNKNOWN',
  OUTDATED = 'OUTDATED',
  UPDATED = 'UPDATED',
  NEWER = 'NEWER',
}

export interface VersionInfo {
  /** Zero-based line of `version=`, or -1. */
  lineNumber: number;
  current: string;
  latest: Latest;
}

export function resolved(version: string): Latest {
  return { kind: 'resolved', version };
}

export function failed(reason: ResolutionFailure): Latest {
  return { kind: 'failed', reason };
}

/** Text shown in place of the latest version. */
export function describeLatest(latest: Latest): string {
  return latest.kind === 'resolved' ? latest.version : RESOLUTION_FAILURE_MESSAGES[latest.reason];
}
