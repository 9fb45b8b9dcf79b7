export type StepName = 'permissions' | 'configure' | 'install';

export type InstallMode = 'sync' | 'manifest';

export type BinarySource = 'flag' | 'env-file' | 'env' | 'path' | 'default';

export interface ResolvedBinary {
  path: string;
  source: BinarySource;
}

export interface BootstrapSettings {
  projectDir: string;
  poetry: ResolvedBinary;
  fixPermissions: boolean;
  quiet: boolean;
  dryRun: boolean;
  /** Environment handed to Poetry. */
  env: NodeJS.ProcessEnv;
}

export interface ProjectFiles {
  manifest: boolean;
  lockfile: boolean;
}

export interface PlannedCommand {
  step: StepName;
  command: string;
  args: string[];
}

export type StepResult =
  | { ok: true; step: StepName; detail?: string }
  | {
      ok: false;
      step: StepName;
      exitCode: number;
      message: string;
      /** Captured tool output, only set in quiet mode. */
      output?: string;
    };

export type StepFailure = Extract<StepResult, { ok: false }>;

export type BootstrapOutcome =
  | {
      status: 'done';
      exitCode: 0;
      installMode: InstallMode;
      steps: StepResult[];
    }
  | {
      status: 'aborted';
      exitCode: number;
      failure: StepFailure;
      steps: StepResult[];
    };

export type BootstrapEvent =
  | { type: 'start'; settings: BootstrapSettings }
  | { type: 'step'; step: StepName; message: string }
  | { type: 'command'; step: StepName; command: string; args: string[] }
  | { type: 'warning'; message: string }
  | { type: 'step-finished'; result: StepResult }
  | { type: 'finished'; outcome: BootstrapOutcome };

export type BootstrapReporter = (event: BootstrapEvent) => void;
