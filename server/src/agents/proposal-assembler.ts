/**
 * ProposalAssembler: merges upstream artifacts into the final document.
 *
 * Pure and deterministic: inputs are named rather than positional, every
 * section is always present in a fixed order, and nothing time-dependent
 * is written into the document. A missing input renders the placeholder
 * instead of dropping the section.
 */

import { tokenize } from './signals.js';
import type {
  MarketTrendsReport,
  ProposalDocument,
  ProposalRequest,
  ProposalSection,
  ProposalSectionId,
  ResearchProfile,
  ResourceBundle,
  ResourceLink,
} from './types.js';

export const NOT_AVAILABLE = 'Not available';

export const SECTION_TITLES: Readonly<Record<ProposalSectionId, string>> = {
  summary: 'Company & Industry Summary',
  trends: 'Market Trends',
  use_cases: 'AI/ML Use Cases',
  feasibility: 'Feasibility Notes',
  resources: 'Resources',
};

export interface AssemblerInputs {
  request: ProposalRequest;
  research?: ResearchProfile;
  market?: MarketTrendsReport;
  resources?: ResourceBundle;
}

// ─── Sections ────────────────────────────────────────────────────────

function buildSection(id: ProposalSectionId, paragraphs: string[] | null, links: ResourceLink[] = []): ProposalSection {
  if (paragraphs === null) {
    return { id, title: SECTION_TITLES[id], available: false, paragraphs: [NOT_AVAILABLE], links: [] };
  }
  return { id, title: SECTION_TITLES[id], available: true, paragraphs, links };
}

function summaryParagraphs(research: ResearchProfile | undefined): string[] | null {
  if (!research) return null;
  const paragraphs = [research.summary];
  if (research.highlights.length > 0) {
    paragraphs.push(research.highlights.map((h) => `- ${h}`).join('\n'));
  }
  if (research.competitors.length > 0) {
    paragraphs.push(`Key competitors: ${research.competitors.join(', ')}.`);
  }
  if (research.focus_terms.length > 0) {
    paragraphs.push(`Focus areas: ${research.focus_terms.join(', ')}.`);
  }
  return paragraphs;
}

function trendParagraphs(market: MarketTrendsReport | undefined): string[] | null {
  if (!market || market.missing_sections.includes('trends')) return null;
  if (market.trends.length === 0) return ['No recent market trends were reported.'];
  return market.trends.map((t) => `**${t.title}**: ${t.summary}${t.url ? ` (${t.url})` : ''}`);
}

function useCaseParagraphs(market: MarketTrendsReport | undefined): string[] | null {
  if (!market || market.missing_sections.includes('use_cases')) return null;
  if (market.use_cases.length === 0) return ['No specific use cases were identified.'];
  return market.use_cases.map((u, i) => `${i + 1}. **${u.title}**: ${u.description}${u.url ? ` (${u.url})` : ''}`);
}

/** Datasets first, then repositories; the first occurrence of a URL wins. */
export function collectResourceLinks(bundle: ResourceBundle): ResourceLink[] {
  const seen = new Set<string>();
  const links: ResourceLink[] = [];
  for (const link of [...bundle.datasets, ...bundle.repositories]) {
    if (seen.has(link.url)) continue;
    seen.add(link.url);
    links.push(link);
  }
  return links;
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

function feasibilityParagraphs(
  research: ResearchProfile | undefined,
  market: MarketTrendsReport | undefined,
  links: ResourceLink[] | null,
  bundle: ResourceBundle | undefined,
): string[] | null {
  if (!research && !market) return null;
  const paragraphs: string[] = [];

  if (links && bundle) {
    const datasets = links.filter((l) => l.resource_type === 'dataset').length;
    const repos = links.length - datasets;
    paragraphs.push(
      `${plural(datasets, 'dataset', 'datasets')} and ${plural(repos, 'code repository', 'code repositories')} were identified for "${bundle.query}".`,
    );
  } else {
    paragraphs.push('Dataset and code repository availability could not be assessed.');
  }

  if (research && research.focus_terms.length > 0) {
    paragraphs.push(`Focus areas for a first implementation: ${research.focus_terms.join(', ')}.`);
  }

  const useCases = market && !market.missing_sections.includes('use_cases') ? market.use_cases : [];
  if (links && useCases.length > 0) {
    for (const useCase of useCases) {
      const terms = new Set(tokenize(useCase.title));
      const supporting = links.filter((l) => tokenize(`${l.title} ${l.description}`).some((t) => terms.has(t))).length;
      paragraphs.push(`${useCase.title}: ${plural(supporting, 'supporting resource', 'supporting resources')}.`);
    }
  }

  return paragraphs;
}

function resourceParagraphs(bundle: ResourceBundle | undefined, links: ResourceLink[] | null): string[] | null {
  if (!bundle || !links) return null;
  if (links.length === 0) return ['No matching datasets or code repositories were found.'];
  return [`${plural(links.length, 'linked resource', 'linked resources')} for "${bundle.query}".`];
}

// ─── Assembly ────────────────────────────────────────────────────────

export function assembleProposal(inputs: AssemblerInputs): ProposalDocument {
  const { request, research, market, resources } = inputs;
  const links = resources ? collectResourceLinks(resources) : null;

  const sections: ProposalSection[] = [
    buildSection('summary', summaryParagraphs(research)),
    buildSection('trends', trendParagraphs(market)),
    buildSection('use_cases', useCaseParagraphs(market)),
    buildSection('feasibility', feasibilityParagraphs(research, market, links, resources)),
    buildSection('resources', resourceParagraphs(resources, links), links ?? []),
  ];

  const missing_sections = sections.filter((s) => !s.available).map((s) => s.id);

  return {
    kind: 'proposal_document',
    company: request.company,
    industry: request.industry,
    sections,
    complete: missing_sections.length === 0,
    missing_sections,
  };
}

// ─── Markdown ────────────────────────────────────────────────────────

function escapeLinkText(text: string): string {
  return text.replace(/([[\]])/g, '\\$1');
}

const RESOURCE_TYPE_LABELS = { dataset: 'Dataset', code_repository: 'Code repository' } as const;

export function renderProposalMarkdown(document: ProposalDocument): string {
  const lines: string[] = [
    `# AI/ML Implementation Proposal: ${document.company}`,
    '',
    `**Industry:** ${document.industry}`,
    '',
  ];

  if (!document.complete) {
    const missing = document.missing_sections.map((id) => SECTION_TITLES[id]).join(', ');
    lines.push(`> Partial proposal. Sections not available: ${missing}.`, '');
  }

  document.sections.forEach((section, index) => {
    lines.push(`## ${index + 1}. ${section.title}`, '');
    for (const paragraph of section.paragraphs) {
      lines.push(paragraph, '');
    }
    for (const link of section.links) {
      const label = `${RESOURCE_TYPE_LABELS[link.resource_type]}, ${link.provider}`;
      const description = link.description ? `: ${link.description}` : '';
      lines.push(`- [${escapeLinkText(link.title)}](${link.url}) (${label})${description}`);
    }
    if (section.links.length > 0) lines.push('');
  });

  return `${lines.join('\n').trimEnd()}\n`;
}
