import fs from "fs";
import path from "path";
import { describe, it, expect, beforeEach } from "vitest";
import {
  appendObservations,
  compactLedger,
  dedupeObservations,
  readLedger,
  sortByName,
  writeLedger,
} from "../../src/ledger/writer";
import type { ScrapedRow } from "../../src/types";
import { makeTempDir } from "../helpers/fixture-loader";

const WAGYU: ScrapedRow = { name: "Wagyu Sirloin", price: "1234", brand: "ProButcher" };
const PORK: ScrapedRow = { name: "Pork Belly", price: "189.50", brand: "Makro" };

function scrapeFrom(pages: Record<string, ScrapedRow[]>): (url: string) => Promise<ScrapedRow[]> {
  return async (url) => pages[url] ?? [];
}

describe("writeLedger", () => {
  let dir: string;
  let ledgerPath: string;

  beforeEach(() => {
    dir = makeTempDir("ledger");
    ledgerPath = path.join(dir, "results", "product_price.csv");
  });

  it("should create the directory, write the header and date every row", async () => {
    const result = await writeLedger(["u1"], ledgerPath, {
      scrape: scrapeFrom({ u1: [WAGYU, PORK] }),
      today: () => "2024-05-01",
    });

    expect(result).toEqual({ ledgerPath, fetched: 2, written: 2 });
    expect(fs.readFileSync(ledgerPath, "utf-8")).toBe(
      "Name,Price,Brand,Date\n" +
        "Pork Belly,189.50,Makro,2024-05-01\n" +
        "Wagyu Sirloin,1234,ProButcher,2024-05-01\n"
    );
  });

  it("should keep one copy of a row fetched twice in the same run", async () => {
    const result = await writeLedger(["u1", "u2"], ledgerPath, {
      scrape: scrapeFrom({ u1: [WAGYU], u2: [WAGYU, PORK] }),
      today: () => "2024-05-01",
    });

    expect(result.fetched).toBe(3);
    expect(result.written).toBe(2);
    expect(readLedger(ledgerPath)).toHaveLength(2);
  });

  it("should append the same rows again when an identical run repeats", async () => {
    const deps = { scrape: scrapeFrom({ u1: [WAGYU] }), today: () => "2024-05-01" };

    await writeLedger(["u1"], ledgerPath, deps);
    await writeLedger(["u1"], ledgerPath, deps);

    expect(fs.readFileSync(ledgerPath, "utf-8")).toBe(
      "Name,Price,Brand,Date\n" +
        "Wagyu Sirloin,1234,ProButcher,2024-05-01\n" +
        "Wagyu Sirloin,1234,ProButcher,2024-05-01\n"
    );
  });

  it("should write rows in non-decreasing name order", async () => {
    const names = ["Tomahawk", "Brisket", "Ribeye", "Brisket Flat", "Chuck", "Oxtail"];
    const rows = names.map((name, i) => ({ name, price: String(100 + i), brand: "B" }));

    await writeLedger(["u1"], ledgerPath, {
      scrape: scrapeFrom({ u1: rows }),
      today: () => "2024-05-01",
    });

    const written = readLedger(ledgerPath).map((o) => o.name);
    expect(written).toEqual(["Brisket", "Brisket Flat", "Chuck", "Oxtail", "Ribeye", "Tomahawk"]);
  });

  it("should still write the header when every page failed", async () => {
    const result = await writeLedger(["u1"], ledgerPath, {
      scrape: scrapeFrom({}),
      today: () => "2024-05-01",
    });

    expect(result.written).toBe(0);
    expect(fs.readFileSync(ledgerPath, "utf-8")).toBe("Name,Price,Brand,Date\n");
  });

  it("should report progress after each URL", async () => {
    const seen: string[] = [];
    await writeLedger(["u1", "u2"], ledgerPath, {
      scrape: scrapeFrom({ u1: [WAGYU] }),
      today: () => "2024-05-01",
      onUrlDone: (completed, total, url, rows) => seen.push(`${completed}/${total} ${url} ${rows.length}`),
    });

    expect(seen).toEqual(["1/2 u1 1", "2/2 u2 0"]);
  });
});

describe("appendObservations", () => {
  it("should write the header into an existing empty file", () => {
    const ledgerPath = path.join(makeTempDir("ledger"), "ledger.csv");
    fs.writeFileSync(ledgerPath, "");

    appendObservations(ledgerPath, [{ ...PORK, date: "2024-05-02" }]);

    expect(fs.readFileSync(ledgerPath, "utf-8")).toBe(
      "Name,Price,Brand,Date\nPork Belly,189.50,Makro,2024-05-02\n"
    );
  });

  it("should quote names containing commas and read them back intact", () => {
    const ledgerPath = path.join(makeTempDir("ledger"), "ledger.csv");
    const row = { name: 'Beef, "Prime" Striploin', price: "899", brand: "Makro", date: "2024-05-02" };

    appendObservations(ledgerPath, [row]);

    expect(fs.readFileSync(ledgerPath, "utf-8")).toBe(
      'Name,Price,Brand,Date\n"Beef, ""Prime"" Striploin",899,Makro,2024-05-02\n'
    );
    expect(readLedger(ledgerPath)).toEqual([row]);
  });
});

describe("dedupeObservations / sortByName", () => {
  it("should treat rows differing only by date as distinct", () => {
    const rows = [
      { ...PORK, date: "2024-05-01" },
      { ...PORK, date: "2024-05-02" },
      { ...PORK, date: "2024-05-01" },
    ];

    expect(dedupeObservations(rows)).toEqual([rows[0], rows[1]]);
  });

  it("should keep input order for equal names", () => {
    const rows = [
      { ...PORK, date: "2024-05-02" },
      { ...WAGYU, date: "2024-05-01" },
      { ...PORK, date: "2024-05-01" },
    ];

    expect(sortByName(rows)).toEqual([rows[0], rows[2], rows[1]]);
  });
});

describe("compactLedger", () => {
  it("should drop cross-run duplicates and re-sort the whole file", async () => {
    const ledgerPath = path.join(makeTempDir("ledger"), "ledger.csv");
    await writeLedger(["u1"], ledgerPath, { scrape: scrapeFrom({ u1: [WAGYU] }), today: () => "2024-05-01" });
    await writeLedger(["u1"], ledgerPath, {
      scrape: scrapeFrom({ u1: [WAGYU, PORK] }),
      today: () => "2024-05-01",
    });

    expect(compactLedger(ledgerPath)).toEqual({ before: 3, after: 2 });
    expect(fs.readFileSync(ledgerPath, "utf-8")).toBe(
      "Name,Price,Brand,Date\n" +
        "Pork Belly,189.50,Makro,2024-05-01\n" +
        "Wagyu Sirloin,1234,ProButcher,2024-05-01\n"
    );
  });
});
