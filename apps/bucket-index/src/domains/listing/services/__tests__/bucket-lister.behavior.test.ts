import { FakeClock } from "@bucket-index/clock"
import { MemoryStorage, StorageError, type StoragePort } from "@bucket-index/storage"
import { mock } from "vitest-mock-extended"
import { ListingError } from "../../model/listing.errors"
import { BucketLister, entryUrl } from "../bucket-lister"

const BUCKET = "releases"
const MODIFIED = new Date(Date.UTC(2025, 0, 2, 3, 4, 5))

describe("entryUrl", () => {
  it("concatenates domain and key as stored", () => {
    expect(entryUrl("https://files.test/", "a b/ü.txt")).toBe("https://files.test/a b/ü.txt")
  })

  it("percent-encodes each segment when asked, keeping slashes", () => {
    expect(entryUrl("https://files.test/", "a b/ü#1.txt", true)).toBe(
      "https://files.test/a%20b/%C3%BC%231.txt",
    )
  })
})

describe("BucketLister", () => {
  let storage: MemoryStorage

  beforeEach(() => {
    storage = new MemoryStorage({ clock: new FakeClock(0) })
    storage.seed(BUCKET, [
      { key: "a/x.txt", sizeInBytes: 10, lastModified: MODIFIED },
      { key: "a/y.txt", sizeInBytes: 2048, lastModified: MODIFIED },
      { key: "b/z.bin", sizeInBytes: 7, lastModified: MODIFIED },
      { key: "root.txt", sizeInBytes: 5, lastModified: MODIFIED },
      { key: "zz.txt", sizeInBytes: 1, lastModified: MODIFIED },
    ])
  })

  it("maps every object to an entry with its public url", async () => {
    const lister = new BucketLister(
      { storage },
      { bucket: BUCKET, publicDomain: "https://files.test/" },
    )

    const entries = await lister.listAll()

    expect(entries[0]).toStrictEqual({
      key: "a/x.txt",
      url: "https://files.test/a/x.txt",
      size: 10,
      lastModifiedMs: MODIFIED.getTime(),
    })
    expect(Object.isFrozen(entries[0])).toBe(true)
  })

  it("follows pages until the listing is complete", async () => {
    const list = vi.spyOn(storage, "list")
    const lister = new BucketLister(
      { storage },
      { bucket: BUCKET, publicDomain: "", pageSize: 2 },
    )

    const entries = await lister.listAll()

    expect(entries.map((e) => e.key)).toStrictEqual([
      "a/x.txt",
      "a/y.txt",
      "b/z.bin",
      "root.txt",
      "zz.txt",
    ])
    expect(list).toHaveBeenCalledTimes(3)
    expect(list).toHaveBeenNthCalledWith(1, BUCKET, { maxKeys: 2 })
    expect(list).toHaveBeenNthCalledWith(2, BUCKET, { maxKeys: 2, cursor: "b/z.bin" })
  })

  it("returns nothing for an empty bucket", async () => {
    const lister = new BucketLister({ storage }, { bucket: "empty", publicDomain: "" })

    expect(await lister.listAll()).toStrictEqual([])
  })

  it("wraps a page failure in listing_failed and returns no partial result", async () => {
    const failing = mock<StoragePort>()
    const cause = new StorageError("denied", { code: "storage_list_failed" })
    failing.list
      .mockResolvedValueOnce({ objects: [{ key: "a", sizeInBytes: 1, lastModified: MODIFIED }], cursor: "b" })
      .mockRejectedValueOnce(cause)

    const lister = new BucketLister({ storage: failing }, { bucket: BUCKET, publicDomain: "" })

    const err = await lister.listAll().catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ListingError)
    expect(err).toMatchObject({
      code: "listing_failed",
      context: { bucket: BUCKET },
      cause,
    })
  })
})
