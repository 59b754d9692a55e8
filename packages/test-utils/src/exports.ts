/**
 * Raw Export Builders
 *
 * Builds raw exports laid out like the default layout expects:
 *
 * ```text
 * header lines (the index row sits at line `indexLine`)
 * one line per stock
 * trailer lines
 * ```
 *
 * Stock rows carry 9 tab-separated fields
 * (name, last, change, high, low, volume, value, date, time), the index row 7
 * (name, last, change, high, low, date, time).
 */

export const EXPORT_DATE = "06/02/2024";
export const EXPORT_TIME = "15:19:51";

export interface StockQuote {
	name: string;
	price: string;
	volume: string;
	value: string;
	date: string;
	time: string;
}

export interface IndexQuote {
	name: string;
	price: string;
	date: string;
	time: string;
}

export interface RawTableOptions {
	index?: Partial<IndexQuote>;
	stocks: StockQuote[];
	/** Default 11 */
	headerLines?: number;
	/** Default 6; must be below `headerLines` */
	indexLine?: number;
	/** Default 5 */
	trailerLines?: number;
}

export function stockRow(quote: StockQuote): string {
	return [quote.name, quote.price, "0,50", quote.price, quote.price, quote.volume, quote.value, quote.date, quote.time].join(
		"\t"
	);
}

export function indexRow(quote: IndexQuote): string {
	return [quote.name, quote.price, "0,20", quote.price, quote.price, quote.date, quote.time].join("\t");
}

export function makeStock(name: string, overrides: Partial<StockQuote> = {}): StockQuote {
	return {
		name,
		price: "10,00",
		volume: "1000",
		value: "10,00",
		date: EXPORT_DATE,
		time: EXPORT_TIME,
		...overrides,
	};
}

/**
 * STK01, STK02, ... with distinct prices and volumes.
 */
export function makeStocks(count: number, overrides: Partial<StockQuote> = {}): StockQuote[] {
	return Array.from({ length: count }, (_, i) => {
		const n = i + 1;
		return makeStock(`STK${String(n).padStart(2, "0")}`, {
			price: `${10 + n},50`,
			volume: `${1000 * n}`,
			value: `${n},25`,
			...overrides,
		});
	});
}

export function buildRawTable(options: RawTableOptions): string {
	const { stocks, headerLines = 11, indexLine = 6, trailerLines = 5 } = options;
	const index: IndexQuote = {
		name: "IBEX 35",
		price: "10.050,20",
		date: EXPORT_DATE,
		time: EXPORT_TIME,
		...options.index,
	};

	const lines: string[] = [];
	for (let i = 0; i < headerLines; i++) {
		lines.push(i === indexLine ? indexRow(index) : `Cabecera ${i}`);
	}
	for (const stock of stocks) {
		lines.push(stockRow(stock));
	}
	for (let i = 0; i < trailerLines; i++) {
		lines.push(`Pie ${i}`);
	}
	return `${lines.join("\n")}\n`;
}

/**
 * A complete export for the default layout: 11 header lines, 35 stocks and
 * 5 trailer lines (51 lines, the minimum).
 */
export function buildDefaultExport(overrides: Partial<StockQuote> = {}): string {
	return buildRawTable({ stocks: makeStocks(35, overrides) });
}

/**
 * Layout for small hand-written exports: index row on line 0, stocks right
 * after it, no trailer.
 */
export const COMPACT_LAYOUT = {
	header_skip: 1,
	index_line: 0,
	trailer_skip: 0,
	min_lines: 2,
} as const;

export function buildCompactExport(stocks: StockQuote[], index: Partial<IndexQuote> = {}): string {
	return buildRawTable({ stocks, index, headerLines: 1, indexLine: 0, trailerLines: 0 });
}
