import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, normalizeLimit, paginate } from "../../app/utils/pagination";

describe("normalizeLimit", () => {
  it.each([
    [undefined, 25],
    [Number.NaN, 25],
    [0, 1],
    [-5, 1],
    [10.7, 10],
    [100, 100],
    [500, 100],
  ])("normalizes %s to %d", (input, expected) => {
    expect(normalizeLimit(input)).toBe(expected);
  });
});

describe("cursors", () => {
  it("decodes what it encodes", () => {
    const cursor = { createdAt: new Date("2024-05-01T10:00:00.000Z"), id: "license-7" };

    expect(encodeCursor(cursor)).toBe(
      Buffer.from("2024-05-01T10:00:00.000Z|license-7", "utf8").toString("base64url")
    );
    expect(decodeCursor(encodeCursor(cursor))).toEqual(cursor);
  });

  it.each([
    ["no separator", Buffer.from("2024-05-01T10:00:00.000Z", "utf8").toString("base64url")],
    ["bad date", Buffer.from("yesterday|license-1", "utf8").toString("base64url")],
    ["missing id", Buffer.from("2024-05-01T10:00:00.000Z|", "utf8").toString("base64url")],
  ])("rejects a cursor with %s", (_label, raw) => {
    expect(() => decodeCursor(raw)).toThrow("invalid cursor");
  });
});

describe("paginate", () => {
  const rows = [
    { id: "c", createdAt: new Date("2024-05-03T00:00:00.000Z") },
    { id: "b", createdAt: new Date("2024-05-02T00:00:00.000Z") },
    { id: "a", createdAt: new Date("2024-05-01T00:00:00.000Z") },
  ];

  it("returns a cursor for the last item when more rows exist", () => {
    const page = paginate(rows, 2);

    expect(page.items.map((r) => r.id)).toEqual(["c", "b"]);
    expect(page.nextCursor).toBe(encodeCursor({ id: "b", createdAt: new Date("2024-05-02T00:00:00.000Z") }));
  });

  it("returns no cursor on the last page", () => {
    expect(paginate(rows, 3)).toEqual({ items: rows, nextCursor: null });
  });
});
