/**
 * Load clonotype group exports into ClonotypeTable
 */

import { type DSVRecord, TSVParser } from "../dsv";
import { ClonotypeTable } from "./table";

/**
 * MiXCR writes plain tab-separated exports; a short row means trailing
 * cells are empty
 */
function createParser(): TSVParser {
  return new TSVParser();
}

async function collect(parser: TSVParser, records: AsyncIterable<DSVRecord>): Promise<ClonotypeTable> {
  const rows: DSVRecord[] = [];
  for await (const record of records) {
    rows.push(record);
  }
  return ClonotypeTable.fromRecords(parser.getHeaders() ?? [], rows);
}

/**
 * Read a clonotype group table from disk
 *
 * @throws {FileError} When the file cannot be read
 * @throws {DSVParseError} When the file has no header, malformed quoting or
 *   a row longer than the header
 */
export async function readClonotypeTable(path: string): Promise<ClonotypeTable> {
  const parser = createParser();
  return collect(parser, parser.parseFile(path));
}

/**
 * Parse a clonotype group table from TSV text
 */
export async function parseClonotypeTable(text: string): Promise<ClonotypeTable> {
  const parser = createParser();
  return collect(parser, parser.parseString(text));
}
