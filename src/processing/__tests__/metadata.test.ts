/**
 * Metadata Extractor Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { join } from 'node:path';
import ExcelJS from 'exceljs';
import JSZip from 'jszip';
import { MetadataExtractor, categoryFor } from '../metadata/metadata-extractor.js';
import { getMimeType } from '../metadata/mime.js';
import { imageColorMode } from '../metadata/extractors.js';
import { createRecordingLogger, createTempDir } from '../../test-utils/index.js';

const CONTENT_TYPES = `<?xml version="1.0" encoding="UTF-8"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
<Default Extension="xml" ContentType="application/xml"/>
<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`;

const ROOT_RELS = `<?xml version="1.0" encoding="UTF-8"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

const CORE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:dcterms="http://purl.org/dc/terms/" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
<dc:title>Quarterly Plan</dc:title>
<dc:creator>Test Author</dc:creator>
<cp:keywords></cp:keywords>
<dcterms:created xsi:type="dcterms:W3CDTF">2024-03-01T10:00:00Z</dcterms:created>
</cp:coreProperties>`;

const DOCUMENT_XML = `<?xml version="1.0" encoding="UTF-8"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>
<w:p><w:r><w:t>Hello</w:t></w:r></w:p>
<w:p><w:r><w:t>World</w:t></w:r></w:p>
<w:tbl><w:tr><w:tc><w:p><w:r><w:t>Cell</w:t></w:r></w:p></w:tc></w:tr></w:tbl>
</w:body></w:document>`;

async function docxBuffer(withDocument = true): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('[Content_Types].xml', CONTENT_TYPES);
  zip.file('_rels/.rels', ROOT_RELS);
  zip.file('docProps/core.xml', CORE_XML);
  if (withDocument) zip.file('word/document.xml', DOCUMENT_XML);
  return zip.generateAsync({ type: 'nodebuffer' });
}

/** Signature and IHDR header of a 3x2 RGBA PNG */
function pngHeader(): Buffer {
  const ihdr = Buffer.alloc(13);
  ihdr.writeUInt32BE(3, 0);
  ihdr.writeUInt32BE(2, 4);
  ihdr.set([8, 6, 0, 0, 0], 8);
  const length = Buffer.alloc(4);
  length.writeUInt32BE(13, 0);
  return Buffer.concat([
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    length,
    Buffer.from('IHDR', 'ascii'),
    ihdr,
    Buffer.alloc(4),
  ]);
}

function ifdEntry(tag: number, count: number, offset: number): Buffer {
  const entry = Buffer.alloc(12);
  entry.writeUInt16BE(tag, 0);
  entry.writeUInt16BE(2, 2); // ASCII
  entry.writeUInt32BE(count, 4);
  entry.writeUInt32BE(offset, 8);
  return entry;
}

/**
 * 3x2 baseline JPEG header: an APP1 Exif block (big-endian TIFF, IFD0 with
 * Make and Model) followed by a three-component SOF0 frame. No scan data.
 */
function jpegWithExif(): Buffer {
  const make = Buffer.from('TestCam\0', 'ascii');
  const model = Buffer.from('Unit 1\0', 'ascii');
  const ifdStart = 8;
  const dataStart = ifdStart + 2 + 2 * 12 + 4;

  const count = Buffer.alloc(2);
  count.writeUInt16BE(2, 0);
  const tiff = Buffer.concat([
    Buffer.from([0x4d, 0x4d, 0x00, 0x2a, 0x00, 0x00, 0x00, ifdStart]),
    count,
    ifdEntry(0x010f, make.length, dataStart),
    ifdEntry(0x0110, model.length, dataStart + make.length),
    Buffer.alloc(4),
    make,
    model,
  ]);
  const exif = Buffer.concat([Buffer.from('Exif\0\0', 'ascii'), tiff]);
  const app1Length = Buffer.alloc(2);
  app1Length.writeUInt16BE(exif.length + 2, 0);

  const sof = Buffer.from([
    0xff, 0xc0, 0x00, 0x11, 0x08, 0x00, 0x02, 0x00, 0x03, 0x03,
    0x01, 0x11, 0x00, 0x02, 0x11, 0x00, 0x03, 0x11, 0x00,
  ]);

  return Buffer.concat([Buffer.from([0xff, 0xd8, 0xff, 0xe1]), app1Length, exif, sof, Buffer.from([0xff, 0xd9])]);
}

const PAGE_STREAM = 'BT /F1 12 Tf 20 100 Td (Hello PDF) Tj ET';

/** One-page PDF with a document-info dictionary and a valid xref table */
function minimalPdf(): string {
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 200 200] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${PAGE_STREAM.length} >>\nstream\n${PAGE_STREAM}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
    '<< /Title (Quarterly Notes) /Author (Test Author) >>',
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xref = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R /Info 6 0 R >>\nstartxref\n${xref}\n%%EOF\n`;
  return pdf;
}

describe('categoryFor', () => {
  it('maps extensions to metadata categories', () => {
    expect(categoryFor('.pdf')).toBe('pdf');
    expect(categoryFor('.doc')).toBe('docx');
    expect(categoryFor('.xls')).toBe('xlsx');
    expect(categoryFor('.jpeg')).toBe('image');
    expect(categoryFor('.ts')).toBe('code');
    expect(categoryFor('.txt')).toBeNull();
  });
});

describe('getMimeType', () => {
  it('looks up known extensions', () => {
    expect(getMimeType('.json')).toBe('application/json');
    expect(getMimeType('.zzz')).toBeUndefined();
  });
});

describe('imageColorMode', () => {
  it('reads the mode from format headers', () => {
    expect(imageColorMode(pngHeader(), 'png')).toBe('RGBA');
    expect(imageColorMode(jpegWithExif(), 'jpg')).toBe('RGB');
    expect(imageColorMode(Buffer.alloc(0), 'gif')).toBe('P');

    const bmp = Buffer.alloc(30);
    bmp.writeUInt16LE(24, 28);
    expect(imageColorMode(bmp, 'bmp')).toBe('RGB');
  });

  it('returns null for unknown or truncated headers', () => {
    expect(imageColorMode(Buffer.alloc(10), 'png')).toBeNull();
    expect(imageColorMode(Buffer.from([0xff, 0xd8]), 'jpg')).toBeNull();
    expect(imageColorMode(Buffer.alloc(40), 'webp')).toBeNull();
    expect(imageColorMode(Buffer.alloc(40), undefined)).toBeNull();
  });
});

describe('MetadataExtractor', () => {
  const dir = createTempDir();

  beforeAll(async () => {
    dir.write('report.docx', await docxBuffer());
    dir.write('hollow.docx', await docxBuffer(false));

    const workbook = new ExcelJS.Workbook();
    workbook.creator = 'Test Author';
    workbook.created = new Date('2024-01-01T00:00:00Z');
    const data = workbook.addWorksheet('Data');
    data.addRow(['a', 'b', 'c']);
    data.addRow([1, 2, 3]);
    workbook.addWorksheet('Extra');
    await workbook.xlsx.writeFile(join(dir.path, 'book.xlsx'));
  });

  afterAll(() => dir.cleanup());

  it('returns the universal tier for any file', async () => {
    const path = dir.write('notes.txt', 'hello');
    const metadata = await new MetadataExtractor({ logger: createRecordingLogger() }).extractMetadata(path);

    expect(metadata).toMatchObject({
      file_name: 'notes.txt',
      file_path: path,
      file_size: 5,
      file_size_mb: 0,
      file_extension: '.txt',
      file_stem: 'notes',
      mime_type: 'text/plain',
    });
    expect(metadata.permissions).toMatch(/^[0-7]{3}$/);
    expect(typeof metadata.created_time).toBe('string');
    expect(Number.isNaN(Date.parse(String(metadata.modified_time)))).toBe(false);
  });

  it('omits mime_type for unknown extensions', async () => {
    const path = dir.write('blob.zzz', 'x');
    const metadata = await new MetadataExtractor().extractMetadata(path);
    expect('mime_type' in metadata).toBe(false);
  });

  it('returns an empty record for a missing file', async () => {
    const logger = createRecordingLogger();
    const path = join(dir.path, 'missing.pdf');

    expect(await new MetadataExtractor({ logger }).extractMetadata(path)).toEqual({});
    expect(logger.warnings).toEqual([`File not found: ${path}`]);
  });

  it('counts code lines and guesses an encoding', async () => {
    const path = dir.write('a.py', 'import os\n# c\n\nx = 1\n');
    const metadata = await new MetadataExtractor().extractMetadata(path);

    expect(metadata).toMatchObject({
      code_total_lines: 5,
      code_non_empty_lines: 3,
      code_comment_lines: 1,
    });
    expect(typeof metadata.code_encoding).toBe('string');
    expect(metadata.code_encoding_confidence).toBeGreaterThan(0);
    expect(metadata.code_encoding_confidence).toBeLessThanOrEqual(1);
  });

  it('reads image dimensions', async () => {
    const path = dir.write('pixel.png', pngHeader());
    const metadata = await new MetadataExtractor().extractMetadata(path);

    expect(metadata).toMatchObject({
      mime_type: 'image/png',
      image_format: 'PNG',
      image_mode: 'RGBA',
      image_width: 3,
      image_height: 2,
      image_size: '3x2',
    });
  });

  it('reads colour mode and EXIF tags from a JPEG', async () => {
    const path = dir.write('photo.jpg', jpegWithExif());
    const metadata = await new MetadataExtractor().extractMetadata(path);

    expect(metadata).toMatchObject({
      mime_type: 'image/jpeg',
      image_format: 'JPEG',
      image_mode: 'RGB',
      image_width: 3,
      image_height: 2,
      image_size: '3x2',
      exif_Make: 'TestCam',
      exif_Model: 'Unit 1',
    });
  });

  it('reads PDF document info and page count', async () => {
    const logger = createRecordingLogger();
    const path = dir.write('notes.pdf', minimalPdf());
    const metadata = await new MetadataExtractor({ logger }).extractMetadata(path);

    expect(logger.warnings).toEqual([]);
    expect(metadata).toMatchObject({
      file_name: 'notes.pdf',
      pdf_title: 'Quarterly Notes',
      pdf_author: 'Test Author',
      pdf_page_count: 1,
    });
    expect('pdf_first_page_preview' in metadata).toBe(true);
  });

  it('keeps the universal tier for a corrupt PDF', async () => {
    const logger = createRecordingLogger();
    const path = dir.write('broken.pdf', 'not a pdf');
    const metadata = await new MetadataExtractor({ logger }).extractMetadata(path);

    expect(metadata.file_name).toBe('broken.pdf');
    expect('pdf_page_count' in metadata).toBe(false);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]?.startsWith(`Failed to extract pdf metadata from ${path}: `)).toBe(true);
  });

  it('reads document properties and structure', async () => {
    const metadata = await new MetadataExtractor().extractMetadata(join(dir.path, 'report.docx'));

    expect(metadata).toMatchObject({
      docx_title: 'Quarterly Plan',
      docx_author: 'Test Author',
      docx_created: '2024-03-01T10:00:00Z',
      docx_paragraph_count: 2,
      docx_table_count: 1,
    });
    expect('docx_keywords' in metadata).toBe(false);
    expect(metadata.docx_text_preview).toMatch(/^Hello\s+World\s+Cell$/);
  });

  it('reads workbook properties and sheets', async () => {
    const metadata = await new MetadataExtractor().extractMetadata(join(dir.path, 'book.xlsx'));

    expect(metadata).toMatchObject({
      xlsx_creator: 'Test Author',
      xlsx_created: '2024-01-01T00:00:00.000Z',
      xlsx_sheet_count: 2,
      xlsx_sheet_names: ['Data', 'Extra'],
      xlsx_first_sheet_rows: 2,
      xlsx_first_sheet_cols: 3,
    });
  });

  it('keeps the universal tier when a category extractor fails', async () => {
    const logger = createRecordingLogger();
    const path = join(dir.path, 'hollow.docx');
    const metadata = await new MetadataExtractor({ logger }).extractMetadata(path);

    expect(metadata.file_name).toBe('hollow.docx');
    expect('docx_paragraph_count' in metadata).toBe(false);
    expect(logger.warnings).toEqual([
      `Failed to extract docx metadata from ${path}: word/document.xml missing from archive`,
    ]);
  });

  it('keeps the universal tier for a corrupt image', async () => {
    const logger = createRecordingLogger();
    const path = dir.write('broken.png', 'not an image');
    const metadata = await new MetadataExtractor({ logger }).extractMetadata(path);

    expect(metadata.mime_type).toBe('image/png');
    expect('image_width' in metadata).toBe(false);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]?.startsWith(`Failed to extract image metadata from ${path}: `)).toBe(true);
  });
});
