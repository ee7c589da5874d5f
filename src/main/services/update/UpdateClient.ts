import type { UpdateCheckResult, VersionTag } from '@shared/contracts';

export interface UpdateClient {
  checkForUpdate(programId: string, localVersion: VersionTag | null): Promise<UpdateCheckResult>;
}
