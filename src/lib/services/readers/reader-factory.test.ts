import { describe, it, expect } from 'vitest';
import { UnsupportedFileError } from '@/lib/utils/errors';
import { ReaderFactory } from './reader-factory';

describe('ReaderFactory', () => {
  const factory = new ReaderFactory();

  it('picks the reader by extension', () => {
    expect(factory.getReader({ filename: 'report.docx' }).getName()).toBe('DocxReader');
    expect(factory.getReader({ filename: 'deck.pptx' }).getName()).toBe('PptxReader');
    expect(factory.isSupported({ filename: 'scan.pdf' })).toBe(false);
    expect(() => factory.getReader({ filename: 'scan.pdf' })).toThrow(UnsupportedFileError);
  });

  it('requires a .docx reference and a .pptx presentation', () => {
    expect(factory.getReaderFor('reference', { filename: 'report.docx' }).getName()).toBe('DocxReader');
    expect(factory.getReaderFor('presentation', { filename: 'deck.pptx' }).getName()).toBe('PptxReader');
    expect(() => factory.getReaderFor('reference', { filename: 'deck.pptx' })).toThrow(UnsupportedFileError);
    expect(() => factory.getReaderFor('presentation', { filename: 'report.docx' })).toThrow(UnsupportedFileError);
  });

  it('lists the supported extensions', () => {
    expect(factory.getSupportedExtensions()).toEqual(['.docx', '.DOCX', '.pptx', '.PPTX']);
  });
});
