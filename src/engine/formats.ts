import JSZip from 'jszip';
import type { FormatDescriptor, TargetFormat } from '../types';

const DOCX_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
const ODT_TYPE = 'application/vnd.oasis.opendocument.text';

/**
 * Target formats and the soffice export filter for each
 */
export const FORMATS: Readonly<Record<TargetFormat, FormatDescriptor>> = {
  pdf: { format: 'pdf', contentType: 'application/pdf', extension: 'pdf', filter: 'pdf' },
  docx: { format: 'docx', contentType: DOCX_TYPE, extension: 'docx', filter: 'docx:"MS Word 2007 XML"' },
  odt: { format: 'odt', contentType: ODT_TYPE, extension: 'odt', filter: 'odt' },
  rtf: { format: 'rtf', contentType: 'application/rtf', extension: 'rtf', filter: 'rtf' },
  html: { format: 'html', contentType: 'text/html', extension: 'html', filter: 'html' },
  txt: { format: 'txt', contentType: 'text/plain', extension: 'txt', filter: 'txt:Text (encoded):UTF8' },
};

export const TARGET_FORMATS = Object.keys(FORMATS).filter(isTargetFormat);

export function isTargetFormat(value: unknown): value is TargetFormat {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(FORMATS, value);
}

// Input content type -> file extension the engine sees
const INPUT_TYPES: Readonly<Record<string, string>> = {
  [DOCX_TYPE]: 'docx',
  'application/msword': 'doc',
  [ODT_TYPE]: 'odt',
  'application/rtf': 'rtf',
  'text/rtf': 'rtf',
  'text/plain': 'txt',
  'text/html': 'html',
};

export const DOCX_CONTENT_TYPE = DOCX_TYPE;

/**
 * Strip parameters and case from a content type ("Text/HTML; charset=utf-8" -> "text/html")
 */
export function normalizeContentType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

export function extensionForContentType(contentType: string): string | undefined {
  return INPUT_TYPES[normalizeContentType(contentType)];
}

export function contentTypeForExtension(extension: string): string | undefined {
  const ext = extension.toLowerCase();
  return Object.keys(INPUT_TYPES).find((type) => INPUT_TYPES[type] === ext);
}

export const INPUT_EXTENSIONS = [...new Set(Object.values(INPUT_TYPES))];

export function isDocx(contentType: string): boolean {
  return normalizeContentType(contentType) === DOCX_TYPE;
}

async function openZip(bytes: Buffer): Promise<JSZip | null> {
  try {
    return await JSZip.loadAsync(bytes);
  } catch {
    return null;
  }
}

/**
 * Check engine output against the target's signature
 *
 * @returns a description of the problem, or null when the output is acceptable
 */
export async function verifyOutput(bytes: Buffer, format: TargetFormat): Promise<string | null> {
  if (bytes.length === 0) {
    return 'output is empty';
  }

  switch (format) {
    case 'pdf': {
      if (bytes.subarray(0, 5).toString('latin1') !== '%PDF-') {
        return 'missing %PDF- header';
      }
      // The trailer may be followed by a newline or incremental-update padding
      if (!bytes.subarray(Math.max(0, bytes.length - 1024)).toString('latin1').includes('%%EOF')) {
        return 'missing %%EOF trailer';
      }
      return null;
    }
    case 'docx': {
      const zip = await openZip(bytes);
      if (!zip) {
        return 'not a ZIP archive';
      }
      if (!zip.file('[Content_Types].xml') || !zip.file('word/document.xml')) {
        return 'ZIP archive is not a Word document';
      }
      return null;
    }
    case 'odt': {
      const zip = await openZip(bytes);
      if (!zip) {
        return 'not a ZIP archive';
      }
      const mimetype = zip.file('mimetype');
      if (!mimetype || (await mimetype.async('string')).trim() !== ODT_TYPE) {
        return 'ZIP archive is not an OpenDocument text';
      }
      return null;
    }
    case 'rtf':
      return bytes.subarray(0, 5).toString('latin1') === '{\\rtf' ? null : 'missing {\\rtf header';
    case 'html':
      return /<html[\s>]/i.test(bytes.toString('utf8')) ? null : 'missing <html> element';
    case 'txt':
      return bytes.includes(0) ? 'text output contains NUL bytes' : null;
  }
}
