import type { PipelineSettings } from '../lib/config.js';
import { createFinalProposalAgent } from './final-proposal.js';
import { createMarketStandardsAgent } from './market-standards.js';
import { createResearchAgent } from './research.js';
import { createResourceAssetAgent } from './resource-asset.js';
import { AgentRegistry } from './runtime/agent-registry.js';

/** Registry holding the four production agents. */
export function createDefaultAgentRegistry(settings: Pick<PipelineSettings, 'max_results_per_query'>): AgentRegistry {
  const maxResults = settings.max_results_per_query;
  return new AgentRegistry()
    .register(createResearchAgent({ maxResults }))
    .register(createMarketStandardsAgent({ maxResults }))
    .register(createResourceAssetAgent({ maxResults }))
    .register(createFinalProposalAgent());
}
