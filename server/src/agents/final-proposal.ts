/**
 * FinalProposal Agent: assembles whatever upstream artifacts committed.
 *
 * Missing inputs never fail this agent; only a defect inside assembly does.
 */

import { AgentFailure, errorMessage } from '../lib/errors.js';
import type { ProposalAgent } from './runtime/agent-protocol.js';
import { assembleProposal, type AssemblerInputs } from './proposal-assembler.js';
import type { ProposalDocument } from './types.js';

export interface FinalProposalAgentOptions {
  assemble?: (inputs: AssemblerInputs) => ProposalDocument;
}

export function createFinalProposalAgent(options: FinalProposalAgentOptions = {}): ProposalAgent<'final_proposal'> {
  const assemble = options.assemble ?? assembleProposal;

  return {
    kind: 'final_proposal',
    description: 'Merges research, market and resource artifacts into the proposal document',

    async run(ctx): Promise<ProposalDocument> {
      const { research_profile, market_trends, resource_bundle } = ctx.inputs;
      let document: ProposalDocument;
      try {
        document = assemble({
          request: ctx.request,
          research: research_profile,
          market: market_trends,
          resources: resource_bundle,
        });
      } catch (err) {
        throw new AgentFailure('final_proposal', 'InternalAssemblyError', `Assembly failed: ${errorMessage(err)}`);
      }

      if (!document.complete) {
        ctx.log.info({ missing: document.missing_sections, degraded: ctx.degraded }, 'Proposal assembled with gaps');
      }
      return document;
    },
  };
}
