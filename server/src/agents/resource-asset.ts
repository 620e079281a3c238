/**
 * ResourceAsset Agent
 *
 * Finds datasets and code repositories for the industry. When the research
 * profile is available its focus terms refine the query; otherwise the
 * query is the bare industry keyword.
 */

import { PROVIDERS } from '../tools/backends/index.js';
import { boundedQuery } from '../tools/backends/query.js';
import type { SearchResult } from '../tools/types.js';
import {
  assertRequiredCalls,
  failedLabels,
  type ProposalAgent,
  type ToolCallResult,
} from './runtime/agent-protocol.js';
import { truncateText } from './signals.js';
import type { ResearchProfile, ResourceBundle, ResourceLink, ResourceType } from './types.js';

export interface ResourceAssetAgentOptions {
  maxResults: number;
  /** Focus terms appended to the industry keyword */
  maxQueryTerms?: number;
}

export function buildResourceQuery(
  industry: string,
  research: ResearchProfile | undefined,
  maxTerms: number,
): { query: string; terms: string[] } {
  const keyword = industry.trim();
  if (!research) return { query: keyword, terms: [] };

  const existing = new Set(keyword.toLowerCase().split(/\s+/));
  const terms = research.focus_terms
    .filter((term) => !existing.has(term.toLowerCase()))
    .slice(0, maxTerms);
  return { query: boundedQuery([keyword, ...terms].join(' ')), terms };
}

function toLinks(call: ToolCallResult, type: ResourceType): ResourceLink[] {
  if (!call.ok) return [];
  return call.results
    .filter((r): r is SearchResult & { url: string } => typeof r.url === 'string')
    .map((r) => ({
      title: truncateText(r.title, 120),
      url: r.url,
      description: truncateText(r.snippet, 300),
      resource_type: type,
      provider: r.source,
    }));
}

export function createResourceAssetAgent(options: ResourceAssetAgentOptions): ProposalAgent<'resource_asset'> {
  const maxTerms = options.maxQueryTerms ?? 3;

  return {
    kind: 'resource_asset',
    description: 'Datasets and code repositories relevant to the proposal',

    async run(ctx): Promise<ResourceBundle> {
      const research = ctx.inputs.research_profile;
      const { query, terms } = buildResourceQuery(ctx.request.industry, research, maxTerms);
      const degraded = research === undefined;
      ctx.log.info({ query, degraded }, 'Resource query built');

      const lookups: Array<Promise<ToolCallResult>> = [
        ctx.callTool(PROVIDERS.datasetRegistry, { query, max_results: options.maxResults },
          { required: true, label: 'datasets' }),
        ctx.callTool(PROVIDERS.codeHost, { query, max_results: options.maxResults },
          { required: true, label: 'repositories' }),
      ];
      if (ctx.hasProvider(PROVIDERS.kaggleDatasets)) {
        lookups.push(ctx.callTool(PROVIDERS.kaggleDatasets, { query, max_results: options.maxResults },
          { required: false, label: 'kaggle_datasets' }));
      }

      const calls = await Promise.all(lookups);
      assertRequiredCalls('resource_asset', calls);

      const datasets = calls
        .filter((c) => c.provider_id !== PROVIDERS.codeHost)
        .flatMap((c) => toLinks(c, 'dataset'));
      const repositories = calls
        .filter((c) => c.provider_id === PROVIDERS.codeHost)
        .flatMap((c) => toLinks(c, 'code_repository'));

      return {
        kind: 'resource_bundle',
        query,
        query_terms: terms,
        degraded_query: degraded,
        datasets,
        repositories,
        missing_sections: failedLabels(calls),
      };
    },
  };
}
