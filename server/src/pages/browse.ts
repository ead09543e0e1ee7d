import {
  BATCH_ID_ATTRIBUTE,
  MANIFEST_ELEMENT_ID,
  MEDIA_KEY_ATTRIBUTE,
  MEDIA_STATE_ATTRIBUTE,
  type BatchManifest,
  type PlaceholderDescriptor
} from "../../../packages/shared/src/index.ts";
import type { CatalogImage, ImageCatalog } from "../catalog/images.ts";
import { paginate, type Page } from "../catalog/paginate.ts";
import { BatchContext } from "../media/batch-context.ts";
import type { AsyncResolver } from "../media/resolver.ts";
import { mediaUrl, type ThumbnailService } from "../thumbnails/service.ts";
import { escapeHtml, jsonForScript } from "./html.ts";

export const LOADING_PLACEHOLDER_SRC = "/static/media-loading.svg";
export const UNAVAILABLE_SRC = "/static/media-unavailable.svg";

export interface BrowsePageDependencies {
  catalog: ImageCatalog;
  thumbnails: ThumbnailService;
  resolver: AsyncResolver;
  imagesPerPage: number;
  thumbnailWidth: number;
  thumbnailHeight: number;
  clientScriptUrl: string;
}

interface GridCell {
  image: CatalogImage;
  placeholder: PlaceholderDescriptor;
}

export interface BrowsePageView {
  sourceId: string;
  page: Page<CatalogImage>;
  cells: GridCell[];
  manifest: BatchManifest;
  thumbnailWidth: number;
  thumbnailHeight: number;
  clientScriptUrl: string;
}

/**
 * Render one page of a source's image grid. Thumbnails are registered in a fresh batch and
 * rendered as placeholders; nothing here waits for generation.
 * Returns null when the source has no images.
 */
export async function renderSourceBrowsePage(
  deps: BrowsePageDependencies,
  sourceId: string,
  pageNumber: number
): Promise<string | null> {
  const images = await deps.catalog.listSourceImages(sourceId);
  if (images.length === 0) {
    return null;
  }

  const page = paginate(images, pageNumber, deps.imagesPerPage);
  const batch = BatchContext.open(deps.resolver, { placeholderSrc: LOADING_PLACEHOLDER_SRC });

  const cells = registerCells(batch, deps.thumbnails, page.items, sourceId);

  return renderBrowsePage({
    sourceId,
    page,
    cells,
    manifest: {
      batchId: batch.batchId,
      mediaKeys: batch.mediaKeys,
      unavailableSrc: UNAVAILABLE_SRC
    },
    thumbnailWidth: deps.thumbnailWidth,
    thumbnailHeight: deps.thumbnailHeight,
    clientScriptUrl: deps.clientScriptUrl
  });
}

function registerCells(
  batch: BatchContext,
  thumbnails: ThumbnailService,
  images: readonly CatalogImage[],
  sourceId: string
): GridCell[] {
  try {
    return images.map((image) => ({
      image,
      placeholder: batch.register(thumbnails.mediaKeyFor(image.objectRef), thumbnails.generator(image.objectRef), {
        group: sourceId
      })
    }));
  } finally {
    batch.close();
  }
}

export function renderBrowsePage(view: BrowsePageView): string {
  const title = `Browse images · ${view.sourceId}`;
  const { page } = view;

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    `<h1>${escapeHtml(title)}</h1>`,
    `<p class="page-summary">Showing page ${page.pageNumber} of ${page.pageCount} (${page.totalItems} images)</p>`,
    '<ul class="image-grid">',
    ...view.cells.map((cell) => renderCell(cell, view.thumbnailWidth, view.thumbnailHeight)),
    "</ul>",
    renderPagination(view.sourceId, page),
    `<script type="application/json" id="${MANIFEST_ELEMENT_ID}">${jsonForScript(view.manifest)}</script>`,
    `<script type="module" src="${escapeHtml(view.clientScriptUrl)}"></script>`,
    "</body>",
    "</html>"
  ].join("\n");
}

function renderCell(cell: GridCell, width: number, height: number): string {
  const { image, placeholder } = cell;
  const img = [
    `<img src="${escapeHtml(placeholder.placeholderSrc)}"`,
    `${BATCH_ID_ATTRIBUTE}="${escapeHtml(placeholder.batchId)}"`,
    `${MEDIA_KEY_ATTRIBUTE}="${escapeHtml(placeholder.mediaKey)}"`,
    `${MEDIA_STATE_ATTRIBUTE}="pending"`,
    `alt="${escapeHtml(image.name)}"`,
    `width="${width}" height="${height}">`
  ].join(" ");

  return `<li class="thumb-box"><a href="${escapeHtml(mediaUrl(image.objectRef))}">${img}</a></li>`;
}

function renderPagination(sourceId: string, page: Page<CatalogImage>): string {
  const base = `/sources/${encodeURIComponent(sourceId)}/browse`;
  const links: string[] = [];

  if (page.hasPrevious) {
    links.push(`<a rel="prev" href="${base}?page=${page.pageNumber - 1}">Previous</a>`);
  }
  if (page.hasNext) {
    links.push(`<a rel="next" href="${base}?page=${page.pageNumber + 1}">Next</a>`);
  }

  return `<nav class="pagination">${links.join(" ")}</nav>`;
}
