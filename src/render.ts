import type { Gist, GistFile, RenderOptions } from './types';

export const TITLE_MAX_LENGTH = 120;
export const NO_DESCRIPTION = '(no description)';
export const PUBLIC_MARKER = '✅';

const TABLE_HEADER = [
  '| Title | Files | Lang | Public | Updated | Link |',
  '|---|---:|---|:---:|---|---|'
];

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
      timeZoneName: 'short'
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Format an instant as `YYYY-MM-DD HH:mm ZZZ` in an IANA time zone, e.g.
 * `2024-07-01 08:30 EDT`. Returns an empty string for missing or unparsable input.
 */
export function formatTimestamp(value: Date | string | null | undefined, timeZone: string): string {
  if (value === null || value === undefined || value === '') {
    return '';
  }
  const date = typeof value === 'string' ? new Date(value) : value;
  if (Number.isNaN(date.getTime())) {
    return '';
  }

  const parts: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute} ${parts.timeZoneName}`;
}

/**
 * Language of the largest file that reports one. The first file wins a tie.
 */
export function primaryLanguage(files: Record<string, GistFile> | null | undefined): string {
  let best: { language: string; size: number } | undefined;
  for (const file of Object.values(files ?? {})) {
    const size = Number(file.size ?? 0) || 0;
    if (file.language && (!best || size > best.size)) {
      best = { language: file.language, size };
    }
  }
  return best ? best.language : '';
}

export function gistTitle(description: string | null | undefined): string {
  const text = (description ?? '').trim() || NO_DESCRIPTION;
  const firstLine = text.split(/\r\n|\r|\n/)[0];
  return Array.from(firstLine).slice(0, TITLE_MAX_LENGTH).join('');
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

/**
 * Newest first. Array.prototype.sort is stable, so equal or missing
 * timestamps keep fetch order and missing ones end up last.
 */
export function sortByUpdated(gists: readonly Gist[]): Gist[] {
  return [...gists].sort((a, b) => {
    const left = a.updated_at ?? '';
    const right = b.updated_at ?? '';
    if (left === right) {
      return 0;
    }
    return left < right ? 1 : -1;
  });
}

export function renderRow(gist: Gist, timeZone: string): string {
  const title = escapeCell(gistTitle(gist.description));
  const fileCount = Object.keys(gist.files ?? {}).length;
  const lang = escapeCell(primaryLanguage(gist.files));
  const updated = formatTimestamp(gist.updated_at, timeZone);
  const url = gist.html_url ?? '';
  return `| ${title} | ${fileCount} | ${lang} | ${PUBLIC_MARKER} | ${updated} | [open](${url}) |`;
}

const FILTER_INPUT = '<input id="gist-filter" type="search" placeholder="Filter gists…" aria-label="Filter gists">';

const STYLE = `<style>
#gist-filter { width: 100%; max-width: 32rem; padding: 0.4rem 0.6rem; margin: 0.5rem 0 1rem; }
table th.sortable { cursor: pointer; user-select: none; }
table th.sortable[data-dir="asc"]::after { content: " ▲"; }
table th.sortable[data-dir="desc"]::after { content: " ▼"; }
</style>`;

// Columns: 0 Title, 1 Files, 2 Lang, 4 Updated
const SCRIPT = `<script>
(function () {
  var input = document.getElementById('gist-filter');
  var table = document.querySelector('table');
  if (!input || !table || !table.tBodies.length) return;
  var body = table.tBodies[0];
  var rows = function () { return Array.prototype.slice.call(body.rows); };
  input.addEventListener('input', function () {
    var query = input.value.toLowerCase();
    rows().forEach(function (row) {
      row.style.display = row.textContent.toLowerCase().indexOf(query) === -1 ? 'none' : '';
    });
  });
  var sortable = { 0: 'text', 1: 'number', 2: 'text', 4: 'text' };
  Array.prototype.forEach.call(table.tHead.rows[0].cells, function (th, index) {
    if (!(index in sortable)) return;
    th.classList.add('sortable');
    th.addEventListener('click', function () {
      var asc = th.getAttribute('data-dir') !== 'asc';
      Array.prototype.forEach.call(table.tHead.rows[0].cells, function (cell) { cell.removeAttribute('data-dir'); });
      th.setAttribute('data-dir', asc ? 'asc' : 'desc');
      rows().sort(function (a, b) {
        var x = a.cells[index].textContent.trim();
        var y = b.cells[index].textContent.trim();
        var order = sortable[index] === 'number' ? Number(x) - Number(y) : x.localeCompare(y);
        return asc ? order : -order;
      }).forEach(function (row) { body.appendChild(row); });
    });
  });
})();
</script>`;

/**
 * Render the index document. Pure: the caller supplies the generation time.
 */
export function buildMarkdown(gists: readonly Gist[], options: RenderOptions): string {
  const generated = formatTimestamp(options.generatedAt, options.timeZone);
  const lines = [
    '# Gist Index (Public)',
    '',
    `_Auto-generated ${options.schedule} at ${generated}_`,
    ''
  ];

  if (options.html) {
    lines.push(FILTER_INPUT, '');
  }

  lines.push(...TABLE_HEADER);
  for (const gist of sortByUpdated(gists)) {
    lines.push(renderRow(gist, options.timeZone));
  }

  lines.push('', `_Generated by gist-index; runs ${options.schedule} via a scheduled workflow._`);

  if (options.html) {
    lines.push('', STYLE, '', SCRIPT);
  }

  lines.push('');
  return lines.join('\n');
}
