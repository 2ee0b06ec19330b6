// =============================================================================
// SCHEMA PREFIX -- Qualifies table names with the configured PostgreSQL schema.
// =============================================================================

/**
 * Creates a function that qualifies table names with a PostgreSQL schema.
 *
 * - `"public"` -> `"account"` (no schema prefix)
 * - `"fiscus"` -> `"fiscus"."account"`
 */
export function createTableResolver(schema: string): (tableName: string) => string {
	if (schema === "public") {
		return (tableName: string) => `"${tableName}"`;
	}
	return (tableName: string) => `"${schema}"."${tableName}"`;
}
