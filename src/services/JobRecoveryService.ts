import type { PersistenceGateway } from '../infra/persistence/PersistenceGateway.js';
import { logger } from '../infra/logger.js';
import type { JobOrchestrator } from './JobOrchestrator.js';

/**
 * JobRecoveryService - picks up non-terminal jobs nobody is driving
 */
export class JobRecoveryService {
  constructor(
    private gateway: PersistenceGateway,
    private orchestrator: Pick<JobOrchestrator, 'isRunning' | 'schedule'>
  ) {}

  /**
   * Schedule every unfinished job idle for at least `staleMinutes`
   * Pass 0 at startup, when nothing can be in flight yet.
   */
  async resumeStaleJobs(staleMinutes: number): Promise<string[]> {
    const cutoff = new Date(Date.now() - staleMinutes * 60 * 1000);
    const candidates = await this.gateway.listActiveJobs(cutoff);

    const resumed: string[] = [];
    for (const job of candidates) {
      if (this.orchestrator.isRunning(job.id)) {
        continue;
      }
      this.orchestrator.schedule(job.id);
      resumed.push(job.id);
    }

    if (resumed.length > 0) {
      logger.info('Resuming interrupted jobs', { count: resumed.length, jobIds: resumed });
    }
    return resumed;
  }
}
