/**
 * Join relationship detection
 *
 * Pairs columns across distinct tables whose lower-cased names are nearly
 * identical (customerID in orders and customers). Advisory only: nothing
 * checks that the pair is a real foreign key.
 */

import { ratio } from "./similarity.js"
import type { Schema } from "./schema_types.js"
import { DEFAULTS } from "./config.js"

/**
 * Returns "t1.c1 <-> t2.c2" lines, t1 before t2 in schema order.
 */
export function detectRelationships(schema: Schema, threshold: number = DEFAULTS.relationshipThreshold): string[] {
	const tables = Object.keys(schema)
	const relationships: string[] = []

	for (let i = 0; i < tables.length; i++) {
		for (let j = i + 1; j < tables.length; j++) {
			const t1 = tables[i]
			const t2 = tables[j]
			for (const c1 of schema[t1]) {
				for (const c2 of schema[t2]) {
					if (ratio(c1.column.toLowerCase(), c2.column.toLowerCase()) >= threshold) {
						relationships.push(`${t1}.${c1.column} <-> ${t2}.${c2.column}`)
					}
				}
			}
		}
	}

	return relationships
}
