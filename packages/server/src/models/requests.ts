import { z } from "zod";

const nonNegative = z.number().finite().nonnegative();

export const EdgeRequestSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  /** Cost per unit of flow */
  a: nonNegative,
  /** Free-flow cost */
  b: nonNegative,
});

export const GraphRequestSchema = z.union([
  z.object({
    nodes: z.array(z.string().min(1)).optional(),
    edges: z.array(EdgeRequestSchema),
  }),
  z.object({
    /** GML document text */
    gml: z.string().min(1),
  }),
]);

export const AnalysisRequestSchema = z.object({
  graph: GraphRequestSchema,
  vehicles: z.number().int().positive(),
  start: z.string().min(1),
  end: z.string().min(1),
  /** Named solver profile from configs/solver/profiles */
  profile: z.string().optional(),
  /** Fail with 404 instead of reporting an empty comparison */
  requireRoute: z.boolean().optional(),
});

export type EdgeRequest = z.infer<typeof EdgeRequestSchema>;
export type GraphRequest = z.infer<typeof GraphRequestSchema>;
export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;
