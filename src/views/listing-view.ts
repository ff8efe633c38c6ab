import { formatFileSize, type DirectoryListing, type ResolvedEntry } from '../metadata.js';

export interface ListingRenderer {
  render(listing: DirectoryListing): string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function encodeUrlPath(relativePath: string): string {
  if (relativePath === '.' || relativePath === '') {
    return '/';
  }
  return `/${relativePath.split('/').map(encodeURIComponent).join('/')}`;
}

export function encodeDirectoryPath(relativePath: string): string {
  const href = encodeUrlPath(relativePath);
  return href.endsWith('/') ? href : `${href}/`;
}

function formatModified(modifiedMs: number): string {
  return new Date(modifiedMs).toISOString().replace('T', ' ').slice(0, 19);
}

function renderBreadcrumbs(relativePath: string): string {
  const crumbs = ['<a href="/">Root</a>'];
  if (relativePath !== '.') {
    const parts = relativePath.split('/');
    parts.forEach((part, index) => {
      const href = encodeDirectoryPath(parts.slice(0, index + 1).join('/'));
      crumbs.push(`<a href="${escapeHtml(href)}">${escapeHtml(part)}</a>`);
    });
  }
  return `<nav class="breadcrumbs">${crumbs.join(' / ')}</nav>`;
}

function renderEntry(entry: ResolvedEntry): string {
  if (entry.kind === 'directory') {
    const href = escapeHtml(encodeDirectoryPath(entry.relativePath));
    return `<li class="directory"><a href="${href}">${escapeHtml(entry.name)}/</a></li>`;
  }

  const direct = encodeUrlPath(entry.relativePath);
  const links = [`<a href="${escapeHtml(direct)}">${escapeHtml(entry.name)}</a>`];
  links.push(`<a class="download" href="${escapeHtml(`/download${direct}`)}">download</a>`);
  if (entry.category === 'video') {
    links.push(`<a class="play" href="${escapeHtml(`/play${direct}`)}">play</a>`);
  }
  const details = `${formatFileSize(entry.size)} · ${formatModified(entry.modifiedMs)}`;
  return `<li class="${entry.category}">${links.join(' ')} <span class="details">${escapeHtml(details)}</span></li>`;
}

export class HtmlListingRenderer implements ListingRenderer {
  render(listing: DirectoryListing): string {
    const title = listing.path === '.' ? '/' : `/${listing.path}/`;
    const parentLink =
      listing.parent === null
        ? ''
        : `<p class="parent"><a href="${escapeHtml(encodeDirectoryPath(listing.parent))}">Parent Directory</a></p>`;
    const items = listing.entries.map(renderEntry).join('\n');

    return [
      '<!DOCTYPE html>',
      '<html lang="en">',
      '<head>',
      '<meta charset="utf-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1">',
      `<title>Index of ${escapeHtml(title)}</title>`,
      '</head>',
      '<body>',
      `<h1>Index of ${escapeHtml(title)}</h1>`,
      renderBreadcrumbs(listing.path),
      parentLink,
      `<ul class="entries">`,
      items,
      '</ul>',
      '</body>',
      '</html>',
      ''
    ].join('\n');
  }
}
