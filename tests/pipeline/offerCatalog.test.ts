import { describe, it, expect, vi } from "vitest";
import { collectOfferIds, type CursorPage, type TokenPage } from "../../src/pipeline/offerCatalog";

describe("collectOfferIds", () => {
  it("follows last_id until the accumulated count reaches total", async () => {
    const pages: Record<string, CursorPage> = {
      "": { items: ["a", "b"], total: 5, lastId: "c1" },
      c1: { items: ["c", "d"], total: 5, lastId: "c2" },
      c2: { items: ["e"], total: 5, lastId: "c3" },
    };
    const fetchPage = vi.fn(async (cursor: string) => pages[cursor]);

    const offerIds = await collectOfferIds({ style: "cursor", fetchPage });

    expect(offerIds).toEqual(["a", "b", "c", "d", "e"]);
    expect(fetchPage.mock.calls.map(([cursor]) => cursor)).toEqual(["", "c1", "c2"]);
  });

  it("stops after one request for an empty cursor catalog", async () => {
    const fetchPage = vi.fn(async (): Promise<CursorPage> => ({
      items: [],
      total: 0,
      lastId: "",
    }));

    expect(await collectOfferIds({ style: "cursor", fetchPage })).toEqual([]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("stops when a cursor page is empty before total is reached", async () => {
    const fetchPage = vi
      .fn<[string], Promise<CursorPage>>()
      .mockResolvedValueOnce({ items: ["a"], total: 3, lastId: "c1" })
      .mockResolvedValueOnce({ items: [], total: 3, lastId: "c1" });

    expect(await collectOfferIds({ style: "cursor", fetchPage })).toEqual(["a"]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("follows nextPageToken until it is missing or empty", async () => {
    const fetchPage = vi
      .fn<[string], Promise<TokenPage>>()
      .mockResolvedValueOnce({ items: ["s1", "s2"], nextPageToken: "t2" })
      .mockResolvedValueOnce({ items: ["s3"], nextPageToken: "t3" })
      .mockResolvedValueOnce({ items: ["s4"], nextPageToken: "" });

    const offerIds = await collectOfferIds({ style: "token", fetchPage });

    expect(offerIds).toEqual(["s1", "s2", "s3", "s4"]);
    expect(fetchPage.mock.calls.map(([token]) => token)).toEqual(["", "t2", "t3"]);
  });

  it("keeps duplicates", async () => {
    const fetchPage = vi.fn(async (): Promise<TokenPage> => ({ items: ["x", "x"] }));
    expect(await collectOfferIds({ style: "token", fetchPage })).toEqual(["x", "x"]);
  });

  it("propagates page failures", async () => {
    const failure = new Error("boom");
    const fetchPage = vi
      .fn<[string], Promise<TokenPage>>()
      .mockResolvedValueOnce({ items: ["s1"], nextPageToken: "t2" })
      .mockRejectedValueOnce(failure);

    await expect(collectOfferIds({ style: "token", fetchPage })).rejects.toBe(failure);
  });
});
