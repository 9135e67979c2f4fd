/**
 * Format-specific metadata extractors.
 *
 * Each function reads one file and returns its category's fields, keyed
 * with the category prefix. They may throw; the MetadataExtractor isolates
 * each call.
 */

import { readFile } from 'node:fs/promises';
import ExcelJS from 'exceljs';
import JSZip from 'jszip';
import mammoth from 'mammoth';
import { parseStringPromise } from 'xml2js';
import { imageSize } from 'image-size';
import { parse as parseExif } from 'exifr';
import { analyse } from 'chardet';
import { isRecord } from '../../utils/guards.js';

export type MetadataFields = Record<string, unknown>;

const PREVIEW_LENGTH = 500;
const COMMENT_PREFIXES = ['#', '//', '/*', '*'] as const;

// ============================================================================
// PDF
// ============================================================================

/**
 * Page count, first-page text preview and document-info entries.
 */
export async function extractPdfMetadata(path: string): Promise<MetadataFields> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const data = new Uint8Array(await readFile(path));
  const document = await pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise;

  try {
    const metadata: MetadataFields = {};

    const { info } = await document.getMetadata();
    if (isRecord(info)) {
      for (const [key, value] of Object.entries(info)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          metadata[`pdf_${key.toLowerCase()}`] = value;
        }
      }
    }

    metadata.pdf_page_count = document.numPages;

    if (document.numPages > 0) {
      const page = await document.getPage(1);
      const content = await page.getTextContent();
      const text = content.items
        .map((item) => ('str' in item ? item.str : ''))
        .join(' ')
        .trim();
      metadata.pdf_first_page_preview = text === '' ? null : text.slice(0, PREVIEW_LENGTH);
    }

    return metadata;
  } finally {
    await document.destroy();
  }
}

// ============================================================================
// DOCX
// ============================================================================

/** Text of an xml2js node parsed with explicitArray: false */
function xmlText(node: unknown): string | undefined {
  if (typeof node === 'string') return node === '' ? undefined : node;
  if (isRecord(node) && typeof node._ === 'string' && node._ !== '') return node._;
  return undefined;
}

function countNodes(node: unknown): number {
  if (Array.isArray(node)) return node.length;
  return node === undefined || node === null ? 0 : 1;
}

const DOCX_CORE_FIELDS: ReadonlyArray<[string, string]> = [
  ['dc:title', 'docx_title'],
  ['dc:creator', 'docx_author'],
  ['dc:subject', 'docx_subject'],
  ['cp:keywords', 'docx_keywords'],
  ['dcterms:created', 'docx_created'],
  ['dcterms:modified', 'docx_modified'],
  ['cp:lastModifiedBy', 'docx_last_modified_by'],
];

/**
 * Core properties from docProps/core.xml, body paragraph/table counts from
 * word/document.xml, and a plain-text preview.
 */
export async function extractDocxMetadata(path: string): Promise<MetadataFields> {
  const buffer = await readFile(path);
  const zip = await JSZip.loadAsync(buffer);
  const metadata: MetadataFields = {};

  const coreFile = zip.file('docProps/core.xml');
  if (coreFile) {
    const core: unknown = await parseStringPromise(await coreFile.async('string'), { explicitArray: false });
    const props = isRecord(core) ? core['cp:coreProperties'] : undefined;
    if (isRecord(props)) {
      for (const [xmlKey, field] of DOCX_CORE_FIELDS) {
        const value = xmlText(props[xmlKey]);
        if (value !== undefined) metadata[field] = value;
      }
    }
  }

  const documentFile = zip.file('word/document.xml');
  if (!documentFile) {
    throw new Error('word/document.xml missing from archive');
  }
  const document: unknown = await parseStringPromise(await documentFile.async('string'), { explicitArray: false });
  const root = isRecord(document) ? document['w:document'] : undefined;
  const body = isRecord(root) ? root['w:body'] : undefined;
  metadata.docx_paragraph_count = isRecord(body) ? countNodes(body['w:p']) : 0;
  metadata.docx_table_count = isRecord(body) ? countNodes(body['w:tbl']) : 0;

  const { value: text } = await mammoth.extractRawText({ buffer });
  metadata.docx_text_preview = text.trim().slice(0, PREVIEW_LENGTH);

  return metadata;
}

// ============================================================================
// XLSX
// ============================================================================

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Workbook properties, sheet names and the first sheet's extent.
 */
export async function extractXlsxMetadata(path: string): Promise<MetadataFields> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);

  const metadata: MetadataFields = {};
  const properties: Array<[string, string | undefined]> = [
    ['xlsx_title', nonEmpty(workbook.title)],
    ['xlsx_creator', nonEmpty(workbook.creator)],
    ['xlsx_subject', nonEmpty(workbook.subject)],
    ['xlsx_keywords', nonEmpty(workbook.keywords)],
    ['xlsx_last_modified_by', nonEmpty(workbook.lastModifiedBy)],
  ];
  for (const [field, value] of properties) {
    if (value !== undefined) metadata[field] = value;
  }
  const created: unknown = workbook.created;
  const modified: unknown = workbook.modified;
  if (created instanceof Date) metadata.xlsx_created = created.toISOString();
  if (modified instanceof Date) metadata.xlsx_modified = modified.toISOString();

  const sheets = workbook.worksheets;
  metadata.xlsx_sheet_count = sheets.length;
  metadata.xlsx_sheet_names = sheets.map((sheet) => sheet.name);

  const first = sheets[0];
  if (first) {
    metadata.xlsx_first_sheet_rows = first.rowCount;
    metadata.xlsx_first_sheet_cols = first.columnCount;
  }
  return metadata;
}

// ============================================================================
// IMAGE
// ============================================================================

const IMAGE_FORMAT_NAMES: Readonly<Record<string, string>> = {
  jpg: 'JPEG',
};

/** Formats whose EXIF block exifr reads */
const EXIF_FORMATS: ReadonlySet<string> = new Set(['jpg', 'tiff']);

const PNG_COLOR_MODES: Readonly<Record<number, string>> = {
  0: 'L',
  2: 'RGB',
  3: 'P',
  4: 'LA',
  6: 'RGBA',
};

const JPEG_COMPONENT_MODES: Readonly<Record<number, string>> = {
  1: 'L',
  3: 'RGB',
  4: 'CMYK',
};

function isJpegFrameMarker(marker: number): boolean {
  return marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
}

/** Component count from the first SOF segment */
function jpegComponents(buffer: Buffer): number | undefined {
  let offset = 2;
  while (offset + 9 < buffer.length) {
    if (buffer[offset] !== 0xff) return undefined;
    const marker = buffer.readUInt8(offset + 1);
    if (isJpegFrameMarker(marker)) return buffer.readUInt8(offset + 9);
    offset += 2 + buffer.readUInt16BE(offset + 2);
  }
  return undefined;
}

/**
 * Colour mode in the usual imaging-library vocabulary (`RGB`, `RGBA`, `L`,
 * `P`, `CMYK`...), read from the format header. Null when unknown.
 */
export function imageColorMode(buffer: Buffer, type: string | undefined): string | null {
  switch (type) {
    case 'png': {
      if (buffer.length < 26) return null;
      const bitDepth = buffer.readUInt8(24);
      const colorType = buffer.readUInt8(25);
      if (colorType === 0 && bitDepth === 1) return '1';
      if (colorType === 0 && bitDepth === 16) return 'I;16';
      return PNG_COLOR_MODES[colorType] ?? null;
    }
    case 'jpg': {
      const components = jpegComponents(buffer);
      return components === undefined ? null : JPEG_COMPONENT_MODES[components] ?? null;
    }
    case 'gif':
      return 'P';
    case 'bmp': {
      if (buffer.length < 30) return null;
      const bits = buffer.readUInt16LE(28);
      if (bits === 1) return '1';
      if (bits <= 8) return 'P';
      return bits === 32 ? 'RGBA' : 'RGB';
    }
    default:
      return null;
  }
}

function exifValue(value: unknown): string | number | boolean | undefined {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return undefined;
}

/** Scalar EXIF tags as `exif_<TagName>`; binary and nested values are skipped */
async function extractExifFields(buffer: Buffer): Promise<MetadataFields> {
  const tags: unknown = await parseExif(buffer);
  const fields: MetadataFields = {};
  if (!isRecord(tags)) return fields;

  for (const [name, raw] of Object.entries(tags)) {
    const value = exifValue(raw);
    if (value !== undefined) fields[`exif_${name}`] = value;
  }
  return fields;
}

export async function extractImageMetadata(path: string): Promise<MetadataFields> {
  const buffer = await readFile(path);
  const { width, height, type } = imageSize(buffer);
  if (width === undefined || height === undefined) {
    throw new Error('image dimensions not found');
  }

  const metadata: MetadataFields = {
    image_format: type === undefined ? null : IMAGE_FORMAT_NAMES[type] ?? type.toUpperCase(),
    image_mode: imageColorMode(buffer, type),
    image_width: width,
    image_height: height,
    image_size: `${width}x${height}`,
  };

  if (type !== undefined && EXIF_FORMATS.has(type)) {
    Object.assign(metadata, await extractExifFields(buffer));
  }
  return metadata;
}

// ============================================================================
// CODE
// ============================================================================

/**
 * Line counts, comment-line count and a best-effort encoding guess.
 * Comment lines are those starting (after indentation) with #, //, /* or *.
 */
export async function extractCodeMetadata(path: string): Promise<MetadataFields> {
  const buffer = await readFile(path);
  const lines = buffer.toString('utf-8').split('\n');

  const metadata: MetadataFields = {
    code_total_lines: lines.length,
    code_non_empty_lines: lines.filter((line) => line.trim() !== '').length,
    code_comment_lines: lines.filter((line) => {
      const trimmed = line.trim();
      return COMMENT_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
    }).length,
  };

  const [best] = analyse(buffer);
  metadata.code_encoding = best?.name ?? null;
  metadata.code_encoding_confidence = best ? best.confidence / 100 : 0;

  return metadata;
}
