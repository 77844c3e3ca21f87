export interface InstallationRecord {
  /** Exact `MAJOR.MINOR.PATCH` reported by the runtime. */
  version: string;
  installationPath: string;
  /** Basename of the registration link, prefix included. */
  installationId: string;
}

export interface Layout {
  /** Shared versions directory holding registrations and patch aliases. */
  versionsDir: string;
  /** Provenance root: aliases pointing in here are owned by us. */
  managedRoot: string;
  stateDir: string;
  prefix: string;
}

export type DiagnosticCode =
  | 'protected-foreign-alias'
  | 'override-applied'
  | 'override-unresolvable'
  | 'conflict'
  | 'alias-occupied';

export interface Diagnostic {
  level: 'warn' | 'info';
  code: DiagnosticCode;
  alias: string;
  message: string;
  hints?: string[];
}

export type Reporter = (diagnostic: Diagnostic) => void;

export type AliasPlan =
  | { alias: string; action: 'skip'; reason: 'protected' }
  | {
      alias: string;
      action: 'link';
      installation: InstallationRecord;
      source: 'single' | 'override' | 'fallback';
    };

export type LinkMode = 'safe' | 'force';

export type LinkOutcome = 'created' | 'replaced' | 'unchanged' | 'occupied';

export interface RefreshReport {
  records: InstallationRecord[];
  created: string[];
  replaced: string[];
  unchanged: string[];
  skipped: string[];
}
