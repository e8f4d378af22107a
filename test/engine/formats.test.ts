import { describe, it, expect } from '@jest/globals';
import {
  DOCX_CONTENT_TYPE,
  FORMATS,
  TARGET_FORMATS,
  contentTypeForExtension,
  extensionForContentType,
  isDocx,
  isTargetFormat,
  verifyOutput,
} from '../../src/engine/formats';
import { createArtifact } from '../../src/engine/artifact';
import { createTestDocxBuffer, createTestOdtBuffer } from '../helpers/test-docx';
import { pdfBytes } from '../helpers/fake-engine';

describe('formats', () => {
  it('should list every target format', () => {
    expect(TARGET_FORMATS).toEqual(['pdf', 'docx', 'odt', 'rtf', 'html', 'txt']);
    expect(isTargetFormat('pdf')).toBe(true);
    expect(isTargetFormat('xlsx')).toBe(false);
    expect(isTargetFormat('toString')).toBe(false);
  });

  it('should map content types to input extensions', () => {
    expect(extensionForContentType('Text/HTML; charset=utf-8')).toBe('html');
    expect(extensionForContentType('application/msword')).toBe('doc');
    expect(extensionForContentType('text/rtf')).toBe('rtf');
    expect(extensionForContentType('image/png')).toBeUndefined();
    expect(contentTypeForExtension('DOCX')).toBe(DOCX_CONTENT_TYPE);
    expect(isDocx(`${DOCX_CONTENT_TYPE}; charset=binary`)).toBe(true);
  });

  describe('verifyOutput', () => {
    it('should accept well-formed PDFs', async () => {
      expect(await verifyOutput(pdfBytes(), 'pdf')).toBeNull();
    });

    it('should reject empty output for any format', async () => {
      expect(await verifyOutput(Buffer.alloc(0), 'txt')).toBe('output is empty');
    });

    it('should reject truncated PDFs', async () => {
      expect(await verifyOutput(Buffer.from('%PDF-1.7\n1 0 obj'), 'pdf')).toBe('missing %%EOF trailer');
      expect(await verifyOutput(Buffer.from('PK\u0003\u0004'), 'pdf')).toBe('missing %PDF- header');
    });

    it('should check Word and OpenDocument archives', async () => {
      const docx = await createTestDocxBuffer();

      expect(await verifyOutput(docx, 'docx')).toBeNull();
      expect(await verifyOutput(pdfBytes(), 'docx')).toBe('not a ZIP archive');
      expect(await verifyOutput(await createTestOdtBuffer(), 'odt')).toBeNull();
      expect(await verifyOutput(await createTestOdtBuffer('application/zip'), 'odt')).toBe(
        'ZIP archive is not an OpenDocument text'
      );
      expect(await verifyOutput(await createTestOdtBuffer(), 'docx')).toBe('ZIP archive is not a Word document');
    });

    it('should check text formats', async () => {
      expect(await verifyOutput(Buffer.from('{\\rtf1\\ansi hello}'), 'rtf')).toBeNull();
      expect(await verifyOutput(Buffer.from('hello'), 'rtf')).toBe('missing {\\rtf header');
      expect(await verifyOutput(Buffer.from('<!DOCTYPE html>\n<HTML lang="en"><body/></HTML>'), 'html')).toBeNull();
      expect(await verifyOutput(Buffer.from('<p>fragment</p>'), 'html')).toBe('missing <html> element');
      expect(await verifyOutput(Buffer.from('plain text'), 'txt')).toBeNull();
      expect(await verifyOutput(Buffer.from([0x61, 0x00, 0x62]), 'txt')).toBe('text output contains NUL bytes');
    });
  });
});

describe('createArtifact', () => {
  it('should describe the bytes it owns', () => {
    const bytes = Buffer.from('hello');
    const artifact = createArtifact('job-1', bytes, 'txt', new Date('2026-01-01T00:00:00.000Z'));
    bytes.fill(0);

    expect(artifact.bytes.toString()).toBe('hello');
    expect(artifact.sizeBytes).toBe(5);
    expect(artifact.contentType).toBe(FORMATS.txt.contentType);
    expect(artifact.sha256).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
    expect(Object.isFrozen(artifact)).toBe(true);
  });
});
