/**
 * Language Server Result Schemas
 *
 * Responses arrive as untyped JSON-RPC payloads; these schemas narrow them
 * to the shapes the capability layer consumes.
 *
 * @module server/protocol
 * @license BSD-3-Clause
 */

import { z } from 'zod';

export const PositionSchema = z.object({
  character: z.number(),
  line: z.number()
});

export const RangeSchema = z.object({
  end: PositionSchema,
  start: PositionSchema
});

export type LspRange = z.infer<typeof RangeSchema>;

export const LocationSchema = z.object({
  range: RangeSchema,
  uri: z.string()
});

export type LspLocation = z.infer<typeof LocationSchema>;

export const LocationLinkSchema = z.object({
  originSelectionRange: RangeSchema.optional(),
  targetRange: RangeSchema,
  targetSelectionRange: RangeSchema,
  targetUri: z.string()
});

/**
 * `Location | Location[] | LocationLink[] | null`
 */
export const LocationsResultSchema = z.union([
  z.null(),
  LocationSchema,
  z.array(z.union([LocationSchema, LocationLinkSchema]))
]);

/**
 * Hierarchical document symbol
 *
 * @interface DocumentSymbolNode
 */
export interface DocumentSymbolNode {
  children?: DocumentSymbolNode[];
  detail?: string;
  kind: number;
  name: string;
  range: LspRange;
  selectionRange: LspRange;
}

export const DocumentSymbolSchema: z.ZodType<DocumentSymbolNode> = z.lazy(() => z.object({
  children: z.array(DocumentSymbolSchema).optional(),
  detail: z.string().optional(),
  kind: z.number(),
  name: z.string(),
  range: RangeSchema,
  selectionRange: RangeSchema
}));

export const SymbolInformationSchema = z.object({
  containerName: z.string().optional(),
  kind: z.number(),
  location: LocationSchema,
  name: z.string()
});

export type SymbolInformationNode = z.infer<typeof SymbolInformationSchema>;

/**
 * `DocumentSymbol[] | SymbolInformation[] | null`
 */
export const DocumentSymbolResultSchema = z.union([
  z.null(),
  z.array(DocumentSymbolSchema),
  z.array(SymbolInformationSchema)
]);

const MarkedStringSchema = z.union([
  z.string(),
  z.object({ language: z.string(), value: z.string() })
]);

export const HoverResultSchema = z.union([
  z.null(),
  z.object({
    contents: z.union([
      z.object({ kind: z.string(), value: z.string() }),
      MarkedStringSchema,
      z.array(MarkedStringSchema)
    ]),
    range: RangeSchema.optional()
  })
]);

/**
 * Workspace symbol, where `location` may carry only a URI
 */
export const WorkspaceSymbolSchema = z.object({
  containerName: z.string().optional(),
  kind: z.number(),
  location: z.union([LocationSchema, z.object({ uri: z.string() })]),
  name: z.string()
});

export type WorkspaceSymbolNode = z.infer<typeof WorkspaceSymbolSchema>;

export const WorkspaceSymbolResultSchema = z.union([
  z.null(),
  z.array(WorkspaceSymbolSchema)
]);
