export type CollisionPolicy = 'overwrite' | 'skip' | 'rename';

export type MoveMethod = 'rename' | 'copy';

export type MoveOutcome =
  | { status: 'moved'; targetPath: string; method: MoveMethod }
  | { status: 'skipped'; targetPath: string; message: string };

export type SortMoveStatus = 'moved' | 'skipped' | 'failed';

export interface SortMoveResult {
  sourcePath: string;
  /** Final path on success; the intended path when skipped or failed. */
  targetPath: string;
  bucket: string;
  status: SortMoveStatus;
  /** MIME type inferred from the file name, when one is known */
  mimeType: string | null;
  method?: MoveMethod;
  message?: string;
}

export type SortIssueKind = 'directory-read' | 'move';

export interface SortIssue {
  kind: SortIssueKind;
  path: string;
  message: string;
  code?: string;
}

export interface SortReport {
  sourceRoot: string;
  destinationRoot: string;
  results: SortMoveResult[];
  issues: SortIssue[];
  /** Directories whose children were enumerated */
  directoriesVisited: number;
  /** Directories skipped because they resolve to the destination root */
  excluded: string[];
  /** Entries that are neither a regular file nor a directory */
  ignored: string[];
  ok: boolean;
}

export type PreflightFailureKind = 'source-invalid' | 'destination-uncreatable';

export interface PreflightFailure {
  kind: PreflightFailureKind;
  path: string;
  message: string;
  code?: string;
}

export type PreflightResult =
  | { ok: true; path: string }
  | { ok: false; failure: PreflightFailure };
