// src/system/csv.ts
//
// Sable `csv` module: parse(text) -> list of rows, stringify(rows) -> text.
// Quoted fields may contain commas, newlines and doubled quotes ("").
// Shared with the file module's read_csv / write_csv.

import { arg, expectList, expectString } from "../core/builtins";
import { display, makeBuiltin, makeModule } from "../core/values";
import type { ModuleValue, Value } from "../core/values";

export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let fieldStarted = false;

  const endField = () => {
    row.push(field);
    field = "";
    fieldStarted = false;
  };
  const endRow = () => {
    endField();
    rows.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"' && !fieldStarted) {
      quoted = true;
      fieldStarted = true;
    } else if (ch === ",") {
      endField();
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      endRow();
    } else {
      field += ch;
      fieldStarted = true;
    }
  }

  // no trailing empty row for a final newline
  if (fieldStarted || field.length > 0 || row.length > 0) endRow();
  return rows;
}

function quoteField(cell: string): string {
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function stringifyCsv(rows: Value[]): string {
  return rows
    .map((row) => (Array.isArray(row) ? row : [row]).map((cell) => quoteField(display(cell))).join(","))
    .map((line) => line + "\n")
    .join("");
}

export function createCsvModule(): ModuleValue {
  return makeModule("csv", {
    parse: makeBuiltin("csv.parse", (args) => parseCsv(expectString("parse", arg(args, 0)))),
    stringify: makeBuiltin("csv.stringify", (args) => stringifyCsv(expectList("stringify", arg(args, 0)))),
  });
}
