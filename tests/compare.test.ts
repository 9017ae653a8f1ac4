import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { compare } from "../src/compare.js";
import { saveCachedOrders } from "../src/fetch.js";
import type { RawExecutiveOrder, SeriesChartFile } from "../src/types.js";

const NOW = new Date("2025-03-01T00:00:00Z");

const order = (n: number, signing_date: string): RawExecutiveOrder => ({
  document_number: `doc-${n}`,
  executive_order_number: n,
  title: `Order ${n}`,
  signing_date,
  publication_date: signing_date,
  president: null,
  html_url: `https://example.test/d/${n}`
});

describe("compare", () => {
  let dir: string;
  let paths: { inaugurationsFile: string; cacheFile: string; out: string };

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});

    dir = await mkdtemp(join(tmpdir(), "term-pace-"));
    paths = {
      inaugurationsFile: join(dir, "inaugurations.json"),
      cacheFile: join(dir, "orders.json"),
      out: join(dir, "out", "series.json")
    };

    await writeFile(
      paths.inaugurationsFile,
      JSON.stringify({ A: ["01/20/2017", "01/20/2025"], B: ["01/20/2021"] }),
      "utf-8"
    );
    await saveCachedOrders(
      [
        order(1, "2017-02-01"),
        order(2, "2020-12-31"),
        order(3, "2021-01-20"),
        order(4, "2025-02-01"),
        order(5, "1999-05-05")
      ],
      paths.cacheFile
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("skips terms that began before the earliest order", async () => {
    const series = await compare({ ...paths, now: NOW });
    expect(series?.map(s => s.key)).toEqual(["B term 1", "A term 2"]);
  });

  it("writes the chart payload", async () => {
    await compare({ ...paths, now: NOW });
    const chart = JSON.parse(await readFile(paths.out, "utf-8")) as SeriesChartFile;

    expect(chart.horizon_days).toBe(365);
    expect(chart.terms.map(t => t.key)).toEqual(["B term 1", "A term 2"]);
    expect(chart.terms[1].series).toHaveLength(41);
    expect(chart.terms[1].series[40]).toBe(1);
  });

  it("reports orders that could not be attributed", async () => {
    await compare({ ...paths, now: NOW });
    expect(console.warn).toHaveBeenCalledWith("Skipped 1 document that could not be attributed:");
    expect(console.warn).toHaveBeenCalledWith("  - EO 5 (1999-05-05): 1999-05-05 precedes the first term start (2017-01-20)");
  });

  it("includes every term on request", async () => {
    const series = await compare({ ...paths, now: NOW, allTerms: true });
    expect(series?.map(s => s.key)).toEqual(["A term 1", "B term 1", "A term 2"]);
  });

  it("compares named terms even before the data starts", async () => {
    const series = await compare({ ...paths, now: NOW, terms: ["A term 1"], horizonDays: 20 });
    expect(series?.map(s => s.series.length)).toEqual([21]);
    expect(series?.[0].series[12]).toBe(1);
  });

  it("prints a no-data notice when nothing matches", async () => {
    const series = await compare({ ...paths, now: NOW, to: "2000-01-01" });
    expect(series).toBeNull();
    expect(console.log).toHaveBeenCalledWith("No data: no terms match the requested filters.");
  });
});
