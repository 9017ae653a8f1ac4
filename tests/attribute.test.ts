import { describe, expect, it } from "vitest";
import { attribute } from "../src/attribute.js";
import { InvalidDateError, NoCoveringIntervalError } from "../src/errors.js";
import { buildIntervalTable } from "../src/intervals.js";

interface Doc {
  signing_date: string | null;
  title: string;
}

const table = buildIntervalTable(
  [
    { label: "A", start: "2017-01-20" },
    { label: "B", start: "2021-01-20" },
    { label: "A", start: "2025-01-20" }
  ],
  new Date("2025-03-01T00:00:00Z")
);

const doc = (signing_date: string | null, title = "Order"): Doc => ({ signing_date, title });

describe("attribute", () => {
  const documents = [
    doc("2017-02-01", "first"),
    doc("2020-12-31", "second"),
    doc("2021-01-20", "third"),
    doc("2025-02-01", "fourth")
  ];
  const result = attribute(documents, table);

  it("places each document in the term it was signed in", () => {
    expect(result.terms.get("A term 1")?.documents.map(d => d.title)).toEqual(["first", "second"]);
    expect(result.terms.get("B term 1")?.documents.map(d => d.title)).toEqual(["third"]);
    expect(result.terms.get("A term 2")?.documents.map(d => d.title)).toEqual(["fourth"]);
  });

  it("counts documents by day offset from the term start", () => {
    expect(Object.fromEntries(result.terms.get("A term 1")?.dayCounts ?? [])).toEqual({ 12: 1, 1441: 1 });
    expect(Object.fromEntries(result.terms.get("B term 1")?.dayCounts ?? [])).toEqual({ 0: 1 });
    expect(Object.fromEntries(result.terms.get("A term 2")?.dayCounts ?? [])).toEqual({ 12: 1 });
  });

  it("passes documents through unchanged", () => {
    expect(result.terms.get("A term 1")?.documents[0]).toBe(documents[0]);
  });

  it("reports the earliest document date", () => {
    expect(result.earliestDate).toBe("2017-02-01");
    expect(result.failures).toEqual([]);
  });

  it("accumulates several documents on the same day", () => {
    const same = attribute([doc("2021-02-01"), doc("2021-02-01"), doc("2021-02-02")], table);
    expect(Object.fromEntries(same.terms.get("B term 1")?.dayCounts ?? [])).toEqual({ 12: 2, 13: 1 });
  });
});

describe("attribute with unplaceable documents", () => {
  const documents = [
    doc("2016-12-31", "too early"),
    doc(null, "undated"),
    doc("not a date", "garbled"),
    doc("2021-03-01", "ok")
  ];
  const result = attribute(documents, table);

  it("collects every failure without aborting", () => {
    expect(result.failures.map(f => f.document.title)).toEqual(["too early", "undated", "garbled"]);
    expect(result.failures[0].error).toBeInstanceOf(NoCoveringIntervalError);
    expect(result.failures[1].error.message).toBe("Missing signing date");
    expect(result.failures[2].error).toBeInstanceOf(InvalidDateError);
  });

  it("still attributes the valid documents", () => {
    expect(result.terms.get("B term 1")?.documents.map(d => d.title)).toEqual(["ok"]);
    expect(result.earliestDate).toBe("2021-03-01");
  });
});

describe("attribute bookkeeping", () => {
  it("keeps an entry for terms without documents", () => {
    const result = attribute([doc("2018-01-01")], table);
    expect(Array.from(result.terms.keys())).toEqual(["A term 1", "B term 1", "A term 2"]);
    expect(result.terms.get("B term 1")?.documents).toEqual([]);
  });

  it("finds the earliest date regardless of input order", () => {
    const result = attribute([doc("2021-03-01"), doc("2017-05-05"), doc("2019-01-01")], table);
    expect(result.earliestDate).toBe("2017-05-05");
  });

  it("has no earliest date when nothing was attributed", () => {
    expect(attribute([], table).earliestDate).toBeNull();
  });
});
