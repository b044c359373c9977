// packages/erd/src/content.ts
import { z } from 'zod';
import type { ProjectStats } from '@erdbase/core';
import { Errors, fieldErrorsFromZod } from '@erdbase/core';

export const ColumnSchema = z.object({
  name: z.string().min(1),
  type: z.string(),
  nullable: z.boolean().optional(),
});

export const TableSchema = z.object({
  schema: z.string().default(''),
  table: z.string().min(1),
  columns: z.array(ColumnSchema),
  primaryKey: z.object({ columns: z.array(z.string()).min(1) }).optional(),
});

export const ColumnRefSchema = z.object({
  table: z.string().min(1),   // table id: "schema.table" or "table"
  column: z.string().min(1),
});

export const RelationSchema = z.object({
  name: z.string(),
  src: ColumnRefSchema,
  ref: ColumnRefSchema,
});

export const SourceSchema = z.object({
  id: z.string(),
  name: z.string(),
  kind: z.string(),
  tables: z.array(TableSchema).default([]),
  relations: z.array(RelationSchema).default([]),
});

export const ProjectContentSchema = z.object({
  sources: z.array(SourceSchema),
});

export type Column = z.infer<typeof ColumnSchema>;
export type Table = z.infer<typeof TableSchema>;
export type Relation = z.infer<typeof RelationSchema>;
export type Source = z.infer<typeof SourceSchema>;
export type ProjectContent = z.infer<typeof ProjectContentSchema>;

export function tableId(t: Pick<Table, 'schema' | 'table'>): string {
  return t.schema ? `${t.schema}.${t.table}` : t.table;
}

export function parseProjectContent(text: string): ProjectContent {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw Errors.VALIDATION({ content: [`is not valid JSON: ${e instanceof Error ? e.message : String(e)}`] });
  }
  const res = ProjectContentSchema.safeParse(json);
  if (!res.success) {
    const details = fieldErrorsFromZod(res.error);
    throw Errors.VALIDATION(Object.fromEntries(
      Object.entries(details).map(([path, msgs]) => [`content.${path}`, msgs])
    ));
  }
  return res.data;
}

export function computeStats(content: ProjectContent): ProjectStats {
  const tables = new Map<string, Set<string>>();
  let nbRelations = 0;
  for (const source of content.sources) {
    for (const t of source.tables) {
      const cols = tables.get(tableId(t)) ?? new Set<string>();
      for (const c of t.columns) cols.add(c.name);
      tables.set(tableId(t), cols);
    }
    nbRelations += source.relations.length;
  }
  let nbColumns = 0;
  for (const cols of tables.values()) nbColumns += cols.size;
  return { nbSources: content.sources.length, nbTables: tables.size, nbColumns, nbRelations };
}
