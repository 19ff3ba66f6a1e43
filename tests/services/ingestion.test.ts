import { describe, it, expect } from 'vitest';
import { createIngestionOrchestrator } from '../../src/services/ingestion';
import { IngestionOrchestrator } from '../../src/services/ingestion-orchestrator';
import { loadConfig } from '../../src/config';
import { MemoryOpportunityStore } from '../helpers/memory-store';

describe('createIngestionOrchestrator', () => {
  it('assembles an idle orchestrator from configuration', () => {
    const config = loadConfig({ DATABASE_URL: 'postgres://localhost/test', ENABLED_FETCHERS: 'remoteok' });

    const orchestrator = createIngestionOrchestrator(config, new MemoryOpportunityStore());

    expect(orchestrator).toBeInstanceOf(IngestionOrchestrator);
    expect(orchestrator.isRunning).toBe(false);
    expect(orchestrator.getRecentRuns()).toEqual([]);
  });
});
