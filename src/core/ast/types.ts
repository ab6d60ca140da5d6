/**
 * Minimal column reference used by AST builders.
 * Accepts any object with a name and optional table/alias fields.
 */
export interface ColumnRef {
  name: string;
  table?: string;
  alias?: string;
}
