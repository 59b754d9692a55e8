export {
	buildCompactExport,
	buildDefaultExport,
	buildRawTable,
	COMPACT_LAYOUT,
	EXPORT_DATE,
	EXPORT_TIME,
	type IndexQuote,
	indexRow,
	makeStock,
	makeStocks,
	type RawTableOptions,
	type StockQuote,
	stockRow,
} from "./exports.js";
export { createTempDir, type TempDir } from "./tempDir.js";
