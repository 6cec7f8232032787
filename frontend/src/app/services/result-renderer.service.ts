import { type TripPlanResponse, isRecord } from './trip-plan.service';

export type DataRow = Record<string, unknown>;

export interface DataTable {
  title: string;
  rows: DataRow[];
}

interface TableSpec {
  dataKey: string;
  title: string;
}

export interface SectionSpec {
  key: keyof TripPlanResponse;
  heading: string;
  tables: TableSpec[];
}

export const SECTIONS: readonly SectionSpec[] = [
  { key: 'flight_suggestions', heading: '✈️ Flight Suggestions', tables: [] },
  { key: 'itinerary', heading: '🗓️ Trip Itinerary', tables: [] },
  {
    key: 'recommendations',
    heading: '🍽️ Recommendations',
    tables: [
      { dataKey: 'restaurants', title: 'Top Restaurants' },
      { dataKey: 'hotels', title: 'Top Hotels' }
    ]
  },
  {
    key: 'weather_forecast',
    heading: '🌤️ Weather Forecast',
    tables: [{ dataKey: 'forecast', title: '7-Day Forecast' }]
  }
];

const JSON_BLOCK = /```json\n([\s\S]*?)\n```/g;

type ParsedBlock = { ok: true; value: unknown } | { ok: false };

const parseBlock = (source: string): ParsedBlock => {
  try {
    return { ok: true, value: JSON.parse(source) };
  } catch {
    return { ok: false };
  }
};

/**
 * Parses every ```json fenced block in generated markdown. Blocks that are not
 * valid JSON are skipped; the model is not obliged to emit any.
 */
export function extractJsonBlocks(text: string): unknown[] {
  const blocks: unknown[] = [];
  for (const match of text.matchAll(JSON_BLOCK)) {
    const parsed = parseBlock(match[1]);
    if (parsed.ok) {
      blocks.push(parsed.value);
    }
  }
  return blocks;
}

export function extractTables(section: SectionSpec, text: string): DataTable[] {
  if (section.tables.length === 0) {
    return [];
  }

  const tables: DataTable[] = [];
  for (const block of extractJsonBlocks(text)) {
    if (!isRecord(block)) {
      continue;
    }
    for (const { dataKey, title } of section.tables) {
      const value = block[dataKey];
      const rows = Array.isArray(value) ? value.filter(isRecord) : [];
      if (rows.length > 0) {
        tables.push({ title, rows });
      }
    }
  }
  return tables;
}

const formatCell = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
};

// Columns follow the order in which keys first appear across the rows.
export function renderTable(rows: DataRow[]): string {
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) {
        columns.push(key);
      }
    }
  }

  const cells = rows.map((row) => columns.map((column) => formatCell(row[column])));
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...cells.map((line) => line[index].length))
  );
  const line = (values: string[]) => `| ${values.map((value, index) => value.padEnd(widths[index])).join(' | ')} |`;

  return [
    line(columns),
    line(widths.map((width) => '-'.repeat(width))),
    ...cells.map(line)
  ].join('\n');
}

export function renderSection(section: SectionSpec, text: string): string {
  const lines = [`## ${section.heading}`, '', text.trim()];
  for (const table of extractTables(section, text)) {
    lines.push('', `### ${table.title}`, '', renderTable(table.rows));
  }
  return lines.join('\n');
}

export function renderTripPlan(plan: TripPlanResponse): string {
  return `${SECTIONS.map((section) => renderSection(section, plan[section.key])).join('\n\n---\n\n')}\n`;
}
