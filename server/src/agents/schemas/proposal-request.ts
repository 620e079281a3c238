import { z } from 'zod';

export const proposalRequestSchema = z.object({
  company: z.string().trim().min(1, 'company is required').max(200),
  industry: z.string().trim().min(1, 'industry is required').max(120),
});

export type ProposalRequestInput = z.input<typeof proposalRequestSchema>;
