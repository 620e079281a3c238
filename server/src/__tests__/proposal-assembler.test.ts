import { describe, expect, it } from 'vitest';
import {
  NOT_AVAILABLE,
  assembleProposal,
  collectResourceLinks,
  renderProposalMarkdown,
} from '../agents/proposal-assembler.js';
import type { MarketTrendsReport, ResearchProfile, ResourceBundle } from '../agents/types.js';

const request = { company: 'Acme', industry: 'retail' };

const research: ResearchProfile = {
  kind: 'research_profile',
  company: 'Acme',
  industry: 'retail',
  summary: 'Acme sells shoes',
  highlights: ['Uses AI for sizing'],
  competitors: ['Globex'],
  focus_terms: ['sizing'],
  sources: [],
  missing_sections: [],
};

const market: MarketTrendsReport = {
  kind: 'market_trends',
  industry: 'retail',
  trends: [{ title: 'Personalisation', summary: 'Shoppers expect it.', url: 'https://example.com/p' }],
  use_cases: [{ title: 'Sizing recommendation', description: 'Suggest sizes.' }],
  missing_sections: [],
};

const resources: ResourceBundle = {
  kind: 'resource_bundle',
  query: 'retail sizing',
  query_terms: ['sizing'],
  degraded_query: false,
  datasets: [
    {
      title: 'shoe-sizes',
      url: 'https://example.com/d',
      description: 'Foot measurements for sizing',
      resource_type: 'dataset',
      provider: 'dataset_registry',
    },
  ],
  repositories: [
    {
      title: '[fit] model',
      url: 'https://example.com/r',
      description: '',
      resource_type: 'code_repository',
      provider: 'code_host',
    },
  ],
  missing_sections: [],
};

describe('assembleProposal', () => {
  it('always emits the five sections in order', () => {
    const document = assembleProposal({ request });
    expect(document.sections.map((s) => s.id)).toEqual(['summary', 'trends', 'use_cases', 'feasibility', 'resources']);
    expect(document.sections.every((s) => !s.available && s.paragraphs[0] === NOT_AVAILABLE)).toBe(true);
    expect(document.complete).toBe(false);
    expect(document.missing_sections).toEqual(['summary', 'trends', 'use_cases', 'feasibility', 'resources']);
  });

  it('is complete with every input present', () => {
    const document = assembleProposal({ request, research, market, resources });
    expect(document.complete).toBe(true);
    expect(document.missing_sections).toEqual([]);
    expect(document.sections[3].paragraphs).toEqual([
      '1 dataset and 1 code repository were identified for "retail sizing".',
      'Focus areas for a first implementation: sizing.',
      'Sizing recommendation: 1 supporting resource.',
    ]);
  });

  it('is deterministic', () => {
    const inputs = { request, research, market, resources };
    expect(assembleProposal(inputs)).toEqual(assembleProposal(inputs));
  });

  it('marks only the failed half of a partial market report unavailable', () => {
    const document = assembleProposal({
      request,
      research,
      market: { ...market, trends: [], missing_sections: ['trends'] },
      resources,
    });
    expect(document.missing_sections).toEqual(['trends']);
    expect(document.sections[2].paragraphs).toEqual(['1. **Sizing recommendation**: Suggest sizes.']);
  });

  it('keeps feasibility available from research alone', () => {
    const document = assembleProposal({ request, research });
    expect(document.sections[3]).toMatchObject({
      available: true,
      paragraphs: [
        'Dataset and code repository availability could not be assessed.',
        'Focus areas for a first implementation: sizing.',
      ],
    });
  });

  it('describes empty but successful lookups instead of marking them unavailable', () => {
    const document = assembleProposal({
      request,
      research,
      market: { ...market, trends: [], use_cases: [] },
      resources: { ...resources, datasets: [], repositories: [] },
    });
    expect(document.complete).toBe(true);
    expect(document.sections[1].paragraphs).toEqual(['No recent market trends were reported.']);
    expect(document.sections[2].paragraphs).toEqual(['No specific use cases were identified.']);
    expect(document.sections[4].paragraphs).toEqual(['No matching datasets or code repositories were found.']);
  });
});

describe('collectResourceLinks', () => {
  it('lists datasets before repositories and drops repeated urls', () => {
    const duplicate = { ...resources.repositories[0], url: 'https://example.com/d' };
    const links = collectResourceLinks({ ...resources, repositories: [duplicate, ...resources.repositories] });
    expect(links.map((l) => l.title)).toEqual(['shoe-sizes', '[fit] model']);
  });
});

describe('renderProposalMarkdown', () => {
  it('renders a complete proposal', () => {
    const markdown = renderProposalMarkdown(assembleProposal({ request, research, market, resources }));
    expect(markdown).toBe([
      '# AI/ML Implementation Proposal: Acme',
      '',
      '**Industry:** retail',
      '',
      '## 1. Company & Industry Summary',
      '',
      'Acme sells shoes',
      '',
      '- Uses AI for sizing',
      '',
      'Key competitors: Globex.',
      '',
      'Focus areas: sizing.',
      '',
      '## 2. Market Trends',
      '',
      '**Personalisation**: Shoppers expect it. (https://example.com/p)',
      '',
      '## 3. AI/ML Use Cases',
      '',
      '1. **Sizing recommendation**: Suggest sizes.',
      '',
      '## 4. Feasibility Notes',
      '',
      '1 dataset and 1 code repository were identified for "retail sizing".',
      '',
      'Focus areas for a first implementation: sizing.',
      '',
      'Sizing recommendation: 1 supporting resource.',
      '',
      '## 5. Resources',
      '',
      '2 linked resources for "retail sizing".',
      '',
      '- [shoe-sizes](https://example.com/d) (Dataset, dataset_registry): Foot measurements for sizing',
      '- [\\[fit\\] model](https://example.com/r) (Code repository, code_host)',
      '',
    ].join('\n'));
  });

  it('flags a partial proposal and renders the placeholder', () => {
    const markdown = renderProposalMarkdown(assembleProposal({ request, research }));
    const lines = markdown.split('\n');
    expect(lines[4]).toBe('> Partial proposal. Sections not available: Market Trends, AI/ML Use Cases, Resources.');
    expect(lines.slice(lines.indexOf('## 2. Market Trends'), lines.indexOf('## 2. Market Trends') + 3)).toEqual([
      '## 2. Market Trends',
      '',
      NOT_AVAILABLE,
    ]);
  });
});
