import { html } from "hono/html"
import type { Entry, Group } from "../model/listing.model"
import { formatTimestamp, humanReadableSize, shortName } from "./format"

export type RenderedSnapshot = {
  html: string
  json: string
}

export type HtmlPageOptions = {
  title: string
  generatedAt: Date
}

const STYLE = `
body { font-family: system-ui, sans-serif; margin: 2rem auto; max-width: 60rem; padding: 0 1rem; color: #222; }
h1 { font-size: 1.5rem; }
h2 { font-size: 1.1rem; margin-top: 2rem; border-bottom: 1px solid #ddd; }
ul { list-style: none; padding: 0; }
li { display: flex; gap: 1rem; padding: 0.2rem 0; }
li a { flex: 1; }
.size, .modified { color: #666; font-variant-numeric: tabular-nums; }
footer { margin-top: 2rem; color: #888; font-size: 0.85rem; }
`

function renderEntry(entry: Entry) {
  return html`<li><a href="${entry.url}">${shortName(entry.key)}</a> <span class="size">${humanReadableSize(entry.size)}</span> <span class="modified">${formatTimestamp(new Date(entry.lastModifiedMs))}</span></li>`
}

function renderGroup(group: Group) {
  return html`<section>
<h2>${group.name}</h2>
<ul>
${group.entries.map(renderEntry)}
</ul>
</section>`
}

/** HTML5 page, one section per group. Every interpolated value is escaped. */
export async function renderHtml(
  groups: readonly Group[],
  options: HtmlPageOptions,
): Promise<string> {
  const page = await html`<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${options.title}</title>
<style>${STYLE}</style>
</head>
<body>
<h1>${options.title}</h1>
${groups.map(renderGroup)}
<footer>Generated ${formatTimestamp(options.generatedAt)} UTC</footer>
</body>
</html>
`

  return page.toString()
}

/** `{"data":[{"name","urls":[{"url","size"}]}]}` plus a trailing newline. */
export function renderJson(groups: readonly Group[]): string {
  const data = groups.map((g) => ({
    name: g.name,
    urls: g.entries.map((e) => ({ url: e.url, size: e.size })),
  }))

  return `${JSON.stringify({ data })}\n`
}

export type SnapshotRendererOptions = {
  title: string
}

export class SnapshotRenderer {
  constructor(private readonly opts: SnapshotRendererOptions) {}

  async render(groups: readonly Group[], generatedAt: Date): Promise<RenderedSnapshot> {
    return {
      html: await renderHtml(groups, { title: this.opts.title, generatedAt }),
      json: renderJson(groups),
    }
  }
}
