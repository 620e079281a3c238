/**
 * Research Agent
 *
 * Profiles the company and its industry from two web searches (company,
 * industry) and a competitive-landscape analysis, run in parallel. Any
 * one of them succeeding yields a profile; the agent fails only when all
 * three do. Without web results the summary falls back to a generic line.
 */

import { PROVIDERS } from '../tools/backends/index.js';
import { boundedQuery } from '../tools/backends/query.js';
import {
  assertRequiredCalls,
  failedLabels,
  type ProposalAgent,
  type ToolCallResult,
} from './runtime/agent-protocol.js';
import {
  extractFirstSentenceAbout,
  extractFocusTerms,
  extractSignals,
  joinSnippets,
  toSourceLinks,
  truncateText,
} from './signals.js';
import type { ResearchProfile } from './types.js';

export interface ResearchAgentOptions {
  maxResults: number;
}

const HIGHLIGHT_KEYWORDS = [
  'ai', 'machine learning', 'data', 'automation', 'analytics', 'platform',
  'digital', 'cloud', 'products', 'services', 'customers', 'market',
];

function resultsOf(call: ToolCallResult) {
  return call.ok ? call.results : [];
}

export function createResearchAgent(options: ResearchAgentOptions): ProposalAgent<'research'> {
  return {
    kind: 'research',
    description: 'Company and industry profile from web search and business analysis',

    async run(ctx): Promise<ResearchProfile> {
      const { company, industry } = ctx.request;

      const calls = await Promise.all([
        ctx.callTool(PROVIDERS.webSearch, {
          query: boundedQuery(`${company} company overview products services technology`),
          max_results: options.maxResults,
        }, { required: true, label: 'company_profile' }),
        ctx.callTool(PROVIDERS.webSearch, {
          query: boundedQuery(`${industry} industry market position digital maturity`),
          max_results: options.maxResults,
        }, { required: true, label: 'industry_profile' }),
        ctx.callTool(PROVIDERS.businessAnalysis, {
          query: boundedQuery(`Key competitors of ${company} in the ${industry} industry and their AI initiatives`),
          max_results: options.maxResults,
        }, { required: true, label: 'competitors' }),
      ]);
      assertRequiredCalls('research', calls);

      const [companyCall, industryCall, competitorCall] = calls;
      const companyText = joinSnippets(resultsOf(companyCall));
      const industryText = joinSnippets(resultsOf(industryCall));

      const summary =
        extractFirstSentenceAbout(companyText, [company]) ??
        extractFirstSentenceAbout(industryText, [industry]) ??
        `${company} operates in the ${industry} industry.`;

      const highlights = extractSignals(`${companyText} ${industryText}`, HIGHLIGHT_KEYWORDS)
        .filter((h) => h !== summary);

      const competitors = resultsOf(competitorCall)
        .map((r) => truncateText(r.title, 80))
        .slice(0, 5);

      // Company snippets characterise the company best; industry text is the fallback
      const focusSource = companyText || industryText;
      const focus_terms = extractFocusTerms([focusSource], [company, industry]);

      const missing = failedLabels(calls);
      if (missing.length > 0) {
        ctx.log.warn({ missing }, 'Research profile degraded');
      }

      return {
        kind: 'research_profile',
        company,
        industry,
        summary,
        highlights,
        competitors,
        focus_terms,
        sources: toSourceLinks([...resultsOf(companyCall), ...resultsOf(industryCall)]),
        missing_sections: missing,
      };
    },
  };
}
