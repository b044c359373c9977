// packages/erd/src/schema-graph.ts
import type { Column, ProjectContent, Relation } from './content';
import { tableId } from './content';

export type NodeKind = 'Entity' | 'Field';
export type EdgeKind = 'PKFK' | 'Embed' | 'Index';
export interface SGNode { id: string; kind: NodeKind; attrs: Record<string, unknown> }
export interface SGEdge { from: string; to: string; kind: EdgeKind; attrs?: Record<string, unknown> }
export interface SchemaGraphStats {
  entities: number;
  fields: number;
  relations: number;
  danglingRelations: string[];
}
export interface SchemaGraph { nodes: SGNode[]; edges: SGEdge[]; stats: SchemaGraphStats }

interface MergedTable {
  id: string;
  schema: string;
  table: string;
  columns: Map<string, Column>;
  primaryKey: string[];
  sources: string[];
}

// same table in several sources: union of columns, first seen wins
function mergeTables(content: ProjectContent): Map<string, MergedTable> {
  const tables = new Map<string, MergedTable>();
  for (const source of content.sources) {
    for (const t of source.tables) {
      const id = tableId(t);
      let m = tables.get(id);
      if (!m) {
        m = { id, schema: t.schema, table: t.table, columns: new Map(), primaryKey: [], sources: [] };
        tables.set(id, m);
      }
      if (!m.sources.includes(source.id)) m.sources.push(source.id);
      for (const c of t.columns) if (!m.columns.has(c.name)) m.columns.set(c.name, c);
      if (m.primaryKey.length === 0 && t.primaryKey) m.primaryKey = [...t.primaryKey.columns];
    }
  }
  return tables;
}

// node ids carry their kind, so a table named like a column never shares an id with it
export const entityId = (table: string) => `entity:${table}`;
export const fieldId = (table: string, column: string) => `field:${table}#${column}`;

export function buildSchemaGraph(content: ProjectContent): SchemaGraph {
  const tables = mergeTables(content);
  const nodes: SGNode[] = [];
  const edges: SGEdge[] = [];
  const fields = new Set<string>();

  for (const t of tables.values()) {
    const entity = entityId(t.id);
    nodes.push({
      id: entity,
      kind: 'Entity',
      attrs: { schema: t.schema, table: t.table, sources: t.sources, columnCount: t.columns.size },
    });
    for (const c of t.columns.values()) {
      const id = fieldId(t.id, c.name);
      fields.add(id);
      nodes.push({
        id,
        kind: 'Field',
        attrs: {
          entity: t.id,
          name: c.name,
          type: c.type,
          nullable: c.nullable ?? false,
          primaryKey: t.primaryKey.includes(c.name),
        },
      });
      edges.push({ from: id, to: entity, kind: 'Embed' });
    }
    for (const pk of t.primaryKey) {
      if (t.columns.has(pk)) edges.push({ from: entity, to: fieldId(t.id, pk), kind: 'Index', attrs: { primaryKey: true } });
    }
  }

  const seen = new Set<string>();
  const dangling: string[] = [];
  let relations = 0;
  const endpoints = (r: Relation) => ({ from: fieldId(r.src.table, r.src.column), to: fieldId(r.ref.table, r.ref.column) });
  for (const source of content.sources) {
    for (const r of source.relations) {
      const { from, to } = endpoints(r);
      if (!fields.has(from) || !fields.has(to)) {
        dangling.push(r.name);
        continue;
      }
      const key = `${from}->${to}`;
      if (seen.has(key)) continue;
      seen.add(key);
      edges.push({ from, to, kind: 'PKFK', attrs: { name: r.name } });
      relations++;
    }
  }

  return {
    nodes,
    edges,
    stats: { entities: tables.size, fields: fields.size, relations, danglingRelations: dangling },
  };
}
