/**
 * MarketStandards Agent
 *
 * Collects current AI/ML trends for the industry and concrete use cases
 * for the company. Independent of Research, so it runs alongside it.
 * Both lookups are required; either one alone still yields a report.
 */

import { PROVIDERS } from '../tools/backends/index.js';
import { boundedQuery } from '../tools/backends/query.js';
import { assertRequiredCalls, failedLabels, type ProposalAgent } from './runtime/agent-protocol.js';
import { truncateText } from './signals.js';
import type { MarketTrend, MarketTrendsReport, UseCase } from './types.js';

export interface MarketStandardsAgentOptions {
  maxResults: number;
  /** How far back trend news may reach */
  trendWindowDays?: number;
}

export function createMarketStandardsAgent(options: MarketStandardsAgentOptions): ProposalAgent<'market_standards'> {
  return {
    kind: 'market_standards',
    description: 'Industry AI/ML trends and company-specific use cases',

    async run(ctx): Promise<MarketTrendsReport> {
      const { company, industry } = ctx.request;

      const [trendCall, useCaseCall] = await Promise.all([
        ctx.callTool(PROVIDERS.marketData, {
          query: boundedQuery(`${industry} industry AI machine learning adoption trends`),
          max_results: options.maxResults,
          days: options.trendWindowDays ?? 180,
        }, { required: true, label: 'trends' }),
        ctx.callTool(PROVIDERS.businessAnalysis, {
          query: boundedQuery(`Specific AI/ML use cases for ${company} in the ${industry} industry, with expected benefits and implementation complexity`),
          max_results: options.maxResults,
        }, { required: true, label: 'use_cases' }),
      ]);
      assertRequiredCalls('market_standards', [trendCall, useCaseCall]);

      const trends: MarketTrend[] = trendCall.ok
        ? trendCall.results.map((r) => ({
            title: truncateText(r.title, 120),
            summary: truncateText(r.snippet, 300),
            ...(r.url ? { url: r.url } : {}),
          }))
        : [];

      const use_cases: UseCase[] = useCaseCall.ok
        ? useCaseCall.results.map((r) => ({
            title: truncateText(r.title, 120),
            description: truncateText(r.snippet, 400),
            ...(r.url ? { url: r.url } : {}),
          }))
        : [];

      return {
        kind: 'market_trends',
        industry,
        trends,
        use_cases,
        missing_sections: failedLabels([trendCall, useCaseCall]),
      };
    },
  };
}
