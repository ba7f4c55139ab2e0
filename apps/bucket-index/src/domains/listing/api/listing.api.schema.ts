import { z } from "zod"

export const listingFormats = ["json", "html"] as const

export type ListingFormat = (typeof listingFormats)[number]

export const listingQuerySchema = z.object({
  format: z.enum(listingFormats, { error: "format must be one of: json, html" }).optional(),
})

export type ListingQuery = z.infer<typeof listingQuerySchema>
