import type { BundleType } from "../core/bundleSpec.js";
import type { RepositoryResult, FleetResults } from "../core/results.js";

const COLUMNS: ReadonlyArray<{ type: BundleType; heading: string }> = [
  { type: "zstd", heading: "zstd" },
  { type: "zstd-max", heading: "zstd (max)" },
  { type: "gzip-v2", heading: "gzip (v2)" },
  { type: "packed1", heading: "stream" }
];

export interface HtmlIndexOptions {
  generatedAt: Date;
  runId?: string;
  log?: (message: string) => void;
}

function escHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatThousands(n: number): string {
  return String(n).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

function bundleCell(bundles: RepositoryResult, type: BundleType): string {
  const entry = bundles.get(type);
  if (!entry) return "-";
  return `<a href="${escHtml(entry.remoteKey)}">${formatThousands(entry.sizeBytes)}</a>`;
}

function row(repo: string, bundles: RepositoryResult): string {
  const cells = COLUMNS.map((c) => `  <td class="numeric">${bundleCell(bundles, c.type)}</td>`);
  return ["<tr>", `  <td>${escHtml(repo)}</td>`, ...cells, "</tr>"].join("\n");
}

/**
 * Index page for the bundle root. Only repositories with a gzip-v2 bundle are
 * listed; mirrors produce no bundles of their own.
 */
export function renderHtmlIndex(results: FleetResults, opts: HtmlIndexOptions): string {
  const rows: string[] = [];
  for (const repo of Array.from(results.keys()).sort()) {
    const bundles = results.get(repo);
    if (!bundles || !bundles.has("gzip-v2")) {
      opts.log?.(`ignoring repo ${repo} in index because no gzip bundle`);
      continue;
    }
    rows.push(row(repo, bundles));
  }

  const headings = COLUMNS.map((c) => `        <th>${escHtml(c.heading)}</th>`).join("\n");
  const footer = opts.runId
    ? `This page generated at ${opts.generatedAt.toISOString()} by ${escHtml(opts.runId)}.`
    : `This page generated at ${opts.generatedAt.toISOString()}.`;

  return `
<html>
  <head>
    <title>Mercurial Bundles</title>
    <style>
      .numeric {
        text-align: right;
        font-variant-numeric: tabular-nums;
      }
    </style>
  </head>
  <body>
    <h1>Mercurial Bundles</h1>
    <p>
      This server contains Mercurial bundle files that can be used to seed
      repository clones. If your Mercurial client is configured properly,
      it should fetch one of these bundles automatically.
    </p>
    <p>
      The table below lists all available repositories and their bundles.
      Only the most recent bundle is shown. Previous bundles are expired
      after they are superseded.
    </p>
    <p>
      A <a href="bundles.json">JSON document</a> exposes a machine-readable
      representation of this data.
    </p>
    <p>
      <strong>
        Mercurial 4.1 or newer is required to unbundle zstd.
        Please use gzip or stream for older versions.
      </strong>
    </p>
    <table border="1">
      <tr>
        <th>Repository</th>
${headings}
      </tr>
${rows.join("\n")}
    </table>
    <p>${footer}</p>
  </body>
</html>
`.trim();
}
