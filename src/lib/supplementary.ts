import Papa from "papaparse";
import * as XLSX from "xlsx";
import { describeError } from "@/lib/errors";
import type { UploadedFile } from "@/lib/session";
import type { SupplementaryResult, SupplementaryTable } from "@/types/report";

export const SUPPORTED_EXTENSIONS = [".xlsx", ".xls", ".csv"] as const;

type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

const extensionOf = (name: string): string => {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? "" : name.slice(dot).toLowerCase();
};

const isSupported = (extension: string): extension is SupportedExtension =>
  SUPPORTED_EXTENSIONS.some((supported) => supported === extension);

const startsWith = (bytes: Uint8Array, signature: number[]) =>
  bytes.length >= signature.length &&
  signature.every((byte, index) => bytes[index] === byte);

const normalizeCell = (value: unknown): string => {
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? `${value}` : "";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value).trim();
};

const buildColumns = (header: unknown[], width: number): string[] => {
  const seen = new Map<string, number>();
  return Array.from({ length: width }, (_, index) => {
    const name = normalizeCell(header[index]) || `Column ${index + 1}`;
    const count = (seen.get(name) ?? 0) + 1;
    seen.set(name, count);
    return count === 1 ? name : `${name} (${count})`;
  });
};

/** First non-blank row is the header; fully blank rows are dropped. */
export function matrixToTable(matrix: unknown[][]): SupplementaryTable | null {
  const filled = matrix.filter((row) =>
    row.some((cell) => normalizeCell(cell) !== "")
  );
  const [header, ...body] = filled;
  if (!header) return null;

  const width = filled.reduce((max, row) => Math.max(max, row.length), 0);
  const columns = buildColumns(header, width);
  const rows = body.map((row) =>
    Object.fromEntries(
      columns.map((column, index) => [column, normalizeCell(row[index])])
    )
  );

  return { columns, rows };
}

const failed = (fileName: string, message: string): SupplementaryResult => ({
  status: "failed",
  fileName,
  message,
});

function parseDelimited(fileName: string, bytes: Uint8Array): SupplementaryResult {
  const text = new TextDecoder("utf-8").decode(bytes);
  const parsed = Papa.parse<string[]>(text, { skipEmptyLines: "greedy" });

  // A single-column file has no detectable delimiter; papaparse still reads it.
  const problem = parsed.errors.find((error) => error.type !== "Delimiter");
  if (problem) {
    const where = problem.row === undefined ? "" : ` (row ${problem.row + 1})`;
    return failed(fileName, `Could not read "${fileName}": ${problem.message}${where}`);
  }

  const table = matrixToTable(parsed.data);
  if (!table) {
    return failed(fileName, `"${fileName}" does not contain a header row.`);
  }
  return { status: "loaded", fileName, table };
}

function parseWorkbook(
  fileName: string,
  extension: ".xlsx" | ".xls",
  bytes: Uint8Array
): SupplementaryResult {
  const signature = extension === ".xlsx" ? ZIP_SIGNATURE : OLE_SIGNATURE;
  if (!startsWith(bytes, signature)) {
    return failed(fileName, `"${fileName}" is not a valid Excel workbook.`);
  }

  const workbook = XLSX.read(bytes, { type: "array" });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    return failed(fileName, `"${fileName}" does not contain any worksheets.`);
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
    defval: "",
    raw: false,
  });
  const table = matrixToTable(matrix);
  if (!table) {
    return failed(fileName, `"${fileName}" does not contain a header row.`);
  }
  return { status: "loaded", fileName, table };
}

/**
 * Reads an uploaded attachment into a table. Returns `null` when no file was
 * given and a `failed` result, never an exception, when it cannot be read.
 */
export async function loadSupplementaryTable(
  file: UploadedFile | null
): Promise<SupplementaryResult | null> {
  if (!file) return null;

  const extension = extensionOf(file.name);
  if (!isSupported(extension)) {
    return failed(
      file.name,
      `Unsupported file type for "${file.name}". Upload an .xlsx, .xls or .csv file.`
    );
  }

  try {
    const bytes = new Uint8Array(await file.arrayBuffer());
    return extension === ".csv"
      ? parseDelimited(file.name, bytes)
      : parseWorkbook(file.name, extension, bytes);
  } catch (error) {
    return failed(file.name, `Could not read "${file.name}": ${describeError(error)}`);
  }
}
