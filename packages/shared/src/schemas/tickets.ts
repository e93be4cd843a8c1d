import { z } from "zod";

// Per-ticket annotation the prompt asks the model to add. Never enforced on model output.
export const SeverityAnalysisSchema = z.object({
  initial_severity: z.string().min(1),
  adjusted_severity: z.string().min(1),
  risk_factors: z.array(z.string()),
  mitigating_factors: z.array(z.string()),
  confidence_score: z.number().min(0).max(100),
  reasoning: z.string(),
});

export type SeverityAnalysis = z.infer<typeof SeverityAnalysisSchema>;

const TicketListSchema = z.object({ tickets: z.array(z.unknown()) });

const AnnotatedTicketSchema = z.object({ severity_analysis: SeverityAnalysisSchema });

/** Any parsed JSON document; usually `{ "tickets": [...] }`. */
export type TicketDataset = unknown;

export function countTickets(dataset: TicketDataset): number {
  const parsed = TicketListSchema.safeParse(dataset);
  return parsed.success ? parsed.data.tickets.length : 0;
}

// Tickets carrying a well-formed severity_analysis object.
export function countAnnotatedTickets(dataset: TicketDataset): number {
  const parsed = TicketListSchema.safeParse(dataset);
  if (!parsed.success) return 0;
  return parsed.data.tickets.filter((ticket) => AnnotatedTicketSchema.safeParse(ticket).success).length;
}
