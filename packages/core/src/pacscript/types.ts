import type { VersionInfo } from '../version/types';

export interface DownloadUrl {
  /** Zero-based line of `url=`, or -1. */
  lineNumber: number;
  value: string;
}

/**
 * Everything pacup knows about one pacscript.
 */
export interface Pacscript {
  path: string;
  /** File name without the `.pacscript` extension. */
  name: string;
  packageName: string;
  version: VersionInfo;
  downloadUrl: DownloadUrl;
  /** Zero-based line of `hash=`, or -1. */
  hashLineNumber: number;
  maintainer: string;
  filterCriteria: ReadonlyMap<string, string>;
  /** Release tag to release notes, newest first. */
  releaseNotes: ReadonlyMap<string, string>;
  /** The file's lines, each with its terminator. */
  rawLines: readonly string[];
}
