/**
 * Write a small sales dataset to <data dir>/sales_data.csv
 *
 * Seeded so repeated runs produce the same file.
 *
 * Usage:
 *   node dist/scripts/generate_sample_data.js [rows]
 */

import * as fs from "fs"
import * as path from "path"
import * as XLSX from "xlsx"
import { loadConfig } from "../src/config/loadConfig.js"

const CUSTOMER_TYPES = ["Enterprise", "SMB", "Startup"]
const PRODUCTS = ["Widget A", "Widget B", "Gadget X"]
const REGIONS = ["North America", "Europe", "Asia", "South America"]

/** mulberry32 */
function seededRandom(seed: number): () => number {
	let state = seed >>> 0
	return () => {
		state = (state + 0x6d2b79f5) >>> 0
		let t = state
		t = Math.imul(t ^ (t >>> 15), t | 1)
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296
	}
}

function pick<T>(items: readonly T[], random: () => number): T {
	const item = items[Math.floor(random() * items.length)]
	if (item === undefined) throw new Error("pick from empty list")
	return item
}

function main() {
	const rows = Number.parseInt(process.argv[2] ?? "50", 10)
	if (!Number.isInteger(rows) || rows < 1) {
		console.error("Usage: generate_sample_data [rows]")
		process.exit(1)
	}
	const random = seededRandom(2023)
	const start = Date.UTC(2023, 0, 1)

	const data: unknown[][] = [["date", "customer_type", "product", "revenue", "region"]]
	for (let i = 0; i < rows; i++) {
		data.push([
			new Date(start + i * 86_400_000).toISOString().slice(0, 10),
			pick(CUSTOMER_TYPES, random),
			pick(PRODUCTS, random),
			5000 + Math.floor(random() * 45000),
			pick(REGIONS, random),
		])
	}

	const dir = loadConfig().data.dir
	fs.mkdirSync(dir, { recursive: true })
	const target = path.join(dir, "sales_data.csv")
	fs.writeFileSync(target, XLSX.utils.sheet_to_csv(XLSX.utils.aoa_to_sheet(data)) + "\n")
	console.log(`Wrote ${rows} rows to ${target}`)
}

main()
