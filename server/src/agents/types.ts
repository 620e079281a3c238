/**
 * Shared type definitions for the proposal pipeline.
 *
 * Each agent is a function from typed inputs to one typed artifact.
 * Agents never share mutable state: upstream data reaches downstream
 * agents only as committed, frozen artifacts.
 */

import type { AgentFailureKind } from '../lib/errors.js';

export const AGENT_KINDS = ['research', 'market_standards', 'resource_asset', 'final_proposal'] as const;

export type AgentKind = (typeof AGENT_KINDS)[number];

export type ArtifactKind = 'research_profile' | 'market_trends' | 'resource_bundle' | 'proposal_document';

export type RunStatus = 'pending' | 'running' | 'completed' | 'partially_failed' | 'failed';

export type TaskStatus = 'waiting' | 'ready' | 'running' | 'succeeded' | 'failed' | 'skipped';

export const TERMINAL_RUN_STATUSES: ReadonlySet<RunStatus> = new Set<RunStatus>([
  'completed',
  'partially_failed',
  'failed',
]);

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>([
  'succeeded',
  'failed',
  'skipped',
]);

export interface ProposalRequest {
  /** Company name or topic */
  company: string;
  industry: string;
}

export interface SourceLink {
  title: string;
  url: string;
}

// ─── Research ────────────────────────────────────────────────────────

export interface ResearchProfile {
  kind: 'research_profile';
  company: string;
  industry: string;
  summary: string;
  highlights: string[];
  competitors: string[];
  /** Terms that characterise the company, used to refine resource queries */
  focus_terms: string[];
  sources: SourceLink[];
  /** Sections degraded because an optional lookup failed */
  missing_sections: string[];
}

// ─── Market Standards ────────────────────────────────────────────────

export interface MarketTrend {
  title: string;
  summary: string;
  url?: string;
}

export interface UseCase {
  title: string;
  description: string;
  url?: string;
}

export interface MarketTrendsReport {
  kind: 'market_trends';
  industry: string;
  trends: MarketTrend[];
  use_cases: UseCase[];
  missing_sections: string[];
}

// ─── Resource Asset ──────────────────────────────────────────────────

export type ResourceType = 'dataset' | 'code_repository';

export interface ResourceLink {
  title: string;
  url: string;
  description: string;
  resource_type: ResourceType;
  provider: string;
}

export interface ResourceBundle {
  kind: 'resource_bundle';
  query: string;
  query_terms: string[];
  /** True when the query was built without the research profile */
  degraded_query: boolean;
  datasets: ResourceLink[];
  repositories: ResourceLink[];
  missing_sections: string[];
}

// ─── Final Proposal ──────────────────────────────────────────────────

export type ProposalSectionId = 'summary' | 'trends' | 'use_cases' | 'feasibility' | 'resources';

export interface ProposalSection {
  id: ProposalSectionId;
  title: string;
  available: boolean;
  /** Rendered text; holds the "Not available" placeholder when unavailable */
  paragraphs: string[];
  links: ResourceLink[];
}

export interface ProposalDocument {
  kind: 'proposal_document';
  company: string;
  industry: string;
  sections: ProposalSection[];
  /** True only when assembled from full upstream data */
  complete: boolean;
  missing_sections: ProposalSectionId[];
}

export type Artifact = ResearchProfile | MarketTrendsReport | ResourceBundle | ProposalDocument;

export interface ArtifactByKind {
  research_profile: ResearchProfile;
  market_trends: MarketTrendsReport;
  resource_bundle: ResourceBundle;
  proposal_document: ProposalDocument;
}

export interface AgentOutput {
  research: ResearchProfile;
  market_standards: MarketTrendsReport;
  resource_asset: ResourceBundle;
  final_proposal: ProposalDocument;
}

/** Committed upstream artifacts visible to an agent. */
export type AgentInputs = Readonly<Partial<Omit<ArtifactByKind, 'proposal_document'>>>;

// ─── Run bookkeeping ─────────────────────────────────────────────────

export interface AgentTask {
  agent: AgentKind;
  produces: ArtifactKind;
  depends_on: ArtifactKind[];
  status: TaskStatus;
  /** Tool-call retries performed by this task's agent */
  retry_count: number;
  last_error: string | null;
  failure_kind: AgentFailureKind | 'DependencyFailed' | 'DependencyTimeout' | 'RunTimeout' | null;
  /** Inputs the task ran without */
  degraded_inputs: ArtifactKind[];
  started_at: string | null;
  finished_at: string | null;
}

export type RunFailureKind = 'DependencyTimeout' | 'AssemblerDefect' | 'RunTimeout' | 'Cancelled';

export interface RunFailure {
  kind: RunFailureKind;
  detail: string;
}

/** Status snapshot returned to callers; a copy, never the live record. */
export interface PipelineRun {
  run_id: string;
  request: ProposalRequest;
  status: RunStatus;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  tasks: AgentTask[];
  missing_sections: ProposalSectionId[];
  failure: RunFailure | null;
}

export type RunResult =
  | { state: 'ready'; status: 'completed' | 'partially_failed'; document: ProposalDocument }
  | { state: 'not_ready'; status: RunStatus }
  | { state: 'failed'; failure: RunFailure }
  | { state: 'not_found' };
