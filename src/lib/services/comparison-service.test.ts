import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DocumentParseError, UnsupportedFileError } from '@/lib/utils/errors';
import { buildDocx, buildPptx, pTextShape, wParagraph } from '@/test-utils/office-fixtures';
import { compareDocuments } from './comparison-service';

describe('compareDocuments', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('reports a match when every slide segment appears in the reference', async () => {
    const reference = { filename: 'report.docx', buffer: await buildDocx(wParagraph('Revenue grew 10%。Costs fell')) };
    const presentation = { filename: 'deck.pptx', buffer: await buildPptx([[pTextShape('Costs  fell')]]) };

    const report = await compareDocuments(reference, presentation);

    expect(report.status).toBe('match');
    expect(report.ghostSegments).toEqual([]);
    expect(report.parseErrors).toEqual([]);
  });

  it('lists presentation segments missing from the reference', async () => {
    const reference = { filename: 'report.docx', buffer: await buildDocx(wParagraph('Revenue grew 10%。Costs fell')) };
    const presentation = {
      filename: 'deck.pptx',
      buffer: await buildPptx([[pTextShape('Revenue grew 10%', 'Profit doubled')]]),
    };

    const report = await compareDocuments(reference, presentation);

    expect(report.status).toBe('ghosts');
    expect(report.ghostSegments).toEqual(['Profitdoubled']);
    expect(report.reference.segments).toEqual(new Set(['Revenuegrew10%', 'Costsfell']));
  });

  it('logs the segment count of each document', async () => {
    const reference = { filename: 'report.docx', buffer: await buildDocx(wParagraph('Revenue grew 10%。Costs fell')) };
    const presentation = { filename: 'deck.pptx', buffer: await buildPptx([[pTextShape('Costs fell')]]) };

    await compareDocuments(reference, presentation);

    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/^\[CMP:\w{8}\]\[SEGMENT\] out=2 kind=reference$/));
    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/^\[CMP:\w{8}\]\[SEGMENT\] out=1 kind=presentation$/));
  });

  it('logs a sample of the ghosts when DEBUG_COMPARE is set', async () => {
    vi.stubEnv('DEBUG_COMPARE', 'true');
    const reference = { filename: 'report.docx', buffer: await buildDocx(wParagraph('Costs fell')) };
    const presentation = {
      filename: 'deck.pptx',
      buffer: await buildPptx([[pTextShape('Costs fell', 'Profit doubled')]]),
    };

    await compareDocuments(reference, presentation);

    expect(console.log).toHaveBeenCalledWith(
      expect.stringMatching(/^\[CMP:\w{8}\]\[DIFF\] → ghost sample sample=Profitdoubled$/)
    );
  });

  it('compares an unreadable document as empty', async () => {
    const reference = { filename: 'report.docx', buffer: Buffer.from('not a zip archive') };
    const presentation = {
      filename: 'deck.pptx',
      buffer: await buildPptx([[pTextShape('Revenue grew 10%', 'Profit doubled')]]),
    };

    const report = await compareDocuments(reference, presentation);

    expect(report.parseErrors).toHaveLength(1);
    expect(report.parseErrors[0]).toBeInstanceOf(DocumentParseError);
    expect(report.parseErrors[0].filename).toBe('report.docx');
    expect(report.reference.segments.size).toBe(0);
    expect(report.ghostSegments).toEqual(['Revenuegrew10%', 'Profitdoubled']);
  });

  it('rejects files of the wrong format before reading anything', async () => {
    const deck = { filename: 'deck.pptx', buffer: await buildPptx([[pTextShape('Slide')]]) };

    await expect(compareDocuments({ filename: 'notes.txt', buffer: Buffer.from('plain') }, deck)).rejects.toBeInstanceOf(
      UnsupportedFileError
    );
    await expect(compareDocuments(deck, deck)).rejects.toThrow(
      'Unsupported file type: deck.pptx. Use a .docx reference and a .pptx presentation.'
    );
    expect(console.log).not.toHaveBeenCalled();
  });
});
