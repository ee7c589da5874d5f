export interface VersionTag {
  major: number;
  minor: number;
  patch: number;
}

export interface ProgramIdentity {
  programId: string;
  currentVersion: VersionTag | null;
}

export interface CurrentVersionRecord {
  programId: string;
  version: string;
  updatedAt: string;
}

export interface UpdateDescriptor {
  version: VersionTag;
  downloadUrl: string;
  sha256: string;
  size: number;
}

export type LauncherErrorCode =
  | 'corrupt_record'
  | 'check_failed'
  | 'verification_failed'
  | 'install_failed'
  | 'install_cancelled'
  | 'install_locked'
  | 'promotion_failed'
  | 'launch_failed';

export interface LauncherFailure {
  code: LauncherErrorCode;
  reason: string;
}

export type CurrentVersionReadResult =
  | { kind: 'installed'; version: VersionTag }
  | { kind: 'not-installed' }
  | { kind: 'corrupt'; code: Extract<LauncherErrorCode, 'corrupt_record'>; reason: string };

export type UpdateCheckResult =
  | { kind: 'up-to-date' }
  | { kind: 'update-available'; descriptor: UpdateDescriptor }
  | { kind: 'check-failed'; code: Extract<LauncherErrorCode, 'check_failed'>; reason: string };

export type LauncherState =
  | 'idle'
  | 'checking'
  | 'up-to-date'
  | 'update-available'
  | 'check-failed'
  | 'prompting'
  | 'declined'
  | 'accepted'
  | 'downloading'
  | 'verifying'
  | 'installing'
  | 'promoting'
  | 'cleaning'
  | 'launching'
  | 'running'
  | 'launch-failed';

export type InstallPhase = 'downloading' | 'verifying' | 'installing';

export interface DownloadProgress {
  receivedBytes: number;
  totalBytes: number;
}

export type LauncherEvent =
  | { type: 'state'; from: LauncherState; to: LauncherState; detail?: string }
  | { type: 'progress'; percent: number; receivedBytes?: number; totalBytes?: number };

export type AutoUpdateMode = 'prompt' | 'always' | 'never';

export interface SupportLinks {
  siteUrl: string;
  qnaUrl: string;
}

export interface LauncherConfig {
  programId: string;
  serverUrl: string;
  executableName: string;
  retainCount: number;
  autoUpdate: AutoUpdateMode;
  requestTimeoutMs: number;
  lockStaleAfterMs: number;
  support: SupportLinks | null;
}

export type LaunchOutcome =
  | {
      state: 'running';
      version: VersionTag;
      executablePath: string;
      pid: number | null;
      updateFailure: LauncherFailure | null;
      history: LauncherState[];
    }
  | {
      state: 'launch-failed';
      version: VersionTag | null;
      code: Extract<LauncherErrorCode, 'launch_failed'>;
      reason: string;
      updateFailure: LauncherFailure | null;
      history: LauncherState[];
    };

export type NoticeLevel = 'CRITICAL' | 'IMPORTANT' | 'INFO';

export interface NoticeInfo {
  id: string;
  level: NoticeLevel;
  force: boolean;
  title: string;
  content: string;
}
