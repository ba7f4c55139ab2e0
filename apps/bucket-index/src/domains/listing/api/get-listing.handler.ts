import { type Context, parseOrThrow, type RequestHandler } from "@bucket-index/server"
import { accepts } from "hono/accepts"
import type { ListingCache } from "../services/listing-cache"
import { type ListingFormat, listingQuerySchema } from "./listing.api.schema"

const CONTENT_TYPES: Record<ListingFormat, string> = {
  json: "application/json; charset=utf-8",
  html: "text/html; charset=utf-8",
}

export type GetListingDeps = {
  cache: ListingCache
}

/** `?format=` wins; otherwise JSON only when Accept prefers it over HTML. */
export function negotiateFormat(c: Context, explicit?: ListingFormat): ListingFormat {
  if (explicit) return explicit

  const preferred = accepts(c, {
    header: "Accept",
    supports: ["text/html", "application/json"],
    default: "text/html",
  })

  return preferred === "application/json" ? "json" : "html"
}

export function getListingHandler(deps: GetListingDeps): RequestHandler {
  return async (c: Context) => {
    const query = parseOrThrow(listingQuerySchema, c.req.query())
    const snapshot = await deps.cache.get()
    const format = negotiateFormat(c, query.format)

    return c.body(format === "json" ? snapshot.json : snapshot.html, 200, {
      "Content-Type": CONTENT_TYPES[format],
      "Last-Modified": new Date(snapshot.createdAtMs).toUTCString(),
      "Cache-Control": "public, max-age=60",
    })
  }
}
