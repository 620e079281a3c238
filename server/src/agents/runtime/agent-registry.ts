/**
 * Agent Registry: maps each agent kind to its implementation.
 *
 * The coordinator resolves agents through a registry instead of importing
 * them directly, so tests and alternative deployments can swap any agent.
 */

import { AGENT_KINDS, type AgentKind } from '../types.js';
import type { ProposalAgent } from './agent-protocol.js';

type AgentTable = { [K in AgentKind]?: ProposalAgent<K> };

export class AgentRegistry {
  private readonly agents: AgentTable = {};

  /** Register an agent. Each kind may be registered once. */
  register<K extends AgentKind>(agent: ProposalAgent<K>): this {
    if (this.agents[agent.kind]) {
      throw new Error(`Agent already registered: ${agent.kind}`);
    }
    const table: { [P in K]?: ProposalAgent<P> } = this.agents;
    table[agent.kind] = agent;
    return this;
  }

  get<K extends AgentKind>(kind: K): ProposalAgent<K> | undefined {
    return this.agents[kind];
  }

  has(kind: AgentKind): boolean {
    return this.agents[kind] !== undefined;
  }

  /** Kinds with a registered implementation, in pipeline order. */
  list(): AgentKind[] {
    return AGENT_KINDS.filter((kind) => this.has(kind));
  }

  describe(): Array<{ kind: AgentKind; description: string }> {
    return this.list().flatMap((kind) => {
      const agent = this.agents[kind];
      return agent ? [{ kind, description: agent.description }] : [];
    });
  }
}
