import * as z from "zod/v4";

export const AttributeValueSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.array(z.number()),
]);

export const AttributesSchema = z.record(z.string(), AttributeValueSchema);

export const NodeDocumentSchema = z.object({
  id: z.string().min(1),
  attributes: AttributesSchema.optional(),
});

export const EdgeDocumentSchema = z.object({
  id: z.string().min(1).optional(),
  source: z.string().min(1),
  target: z.string().min(1),
  directed: z.boolean().optional(),
  attributes: AttributesSchema.optional(),
});

/**
 * JSON form of a graph, as loaded from disk or passed to graph_load.
 */
export const GraphDocumentSchema = z.object({
  directed: z.boolean().optional(),
  nodes: z.array(NodeDocumentSchema),
  edges: z.array(EdgeDocumentSchema).default([]),
});

export type NodeDocument = z.infer<typeof NodeDocumentSchema>;
export type EdgeDocument = z.infer<typeof EdgeDocumentSchema>;
export type GraphDocument = z.input<typeof GraphDocumentSchema>;
