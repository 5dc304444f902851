import type { DocumentReader } from '@/lib/core/interfaces';
import type { DocumentInput, DocxDiagnostics, ExtractionResult } from '@/lib/core/types';
import { openPackage, readXmlPart } from '@/lib/document-processing/processor';
import { childElements, firstChild, type XmlNode } from '@/lib/document-processing/xml-tree';
import {
  CellFallbackError,
  DocumentParseError,
  RowStructureError,
  TableStructureError,
  errorMessage,
} from '@/lib/utils/errors';
import { debug } from '@/lib/utils/debug';
import { splitIntoSegments } from '../nlp/segmenter';
import { WordTable } from './word-table';
import { paragraphText, readRowRawCells } from './word-text';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
const MAIN_PART = 'word/document.xml';

/**
 * DOCX document reader (reference document).
 *
 * Body paragraphs come first, then body tables, each in document order.
 * Table rows degrade step by step instead of failing the document:
 *   grid model → raw-markup cell/paragraph walk → skip row → skip table.
 */
export class DocxReader implements DocumentReader {
  canHandle(input: Pick<DocumentInput, 'filename' | 'mimeType'>): boolean {
    return input.mimeType === DOCX_MIME || input.filename.toLowerCase().endsWith('.docx');
  }

  getSupportedExtensions(): string[] {
    return ['.docx', '.DOCX'];
  }

  async extract(input: DocumentInput): Promise<ExtractionResult> {
    const body = await this.loadBody(input);

    const diagnostics: DocxDiagnostics = {
      format: 'docx',
      paragraphCount: 0,
      tableCount: 0,
      recoveredRows: 0,
      skippedRows: 0,
      skippedTables: 0,
    };
    const fragments: string[] = [];

    try {
      for (const paragraph of childElements(body, 'w:p')) {
        fragments.push(paragraphText(paragraph));
        diagnostics.paragraphCount++;
      }

      childElements(body, 'w:tbl').forEach((table, tableIndex) => {
        diagnostics.tableCount++;
        this.extractTable(table, tableIndex, fragments, diagnostics);
      });
    } catch (error) {
      throw new DocumentParseError(input.filename, errorMessage(error), error);
    }

    const mergedText = fragments.join('\n');
    debug.extract.log('DOCX extracted', { file: input.filename, ...diagnostics });

    return {
      filename: input.filename,
      fragments,
      mergedText,
      segments: splitIntoSegments(mergedText),
      diagnostics,
    };
  }

  getName(): string {
    return 'DocxReader';
  }

  private async loadBody(input: DocumentInput): Promise<XmlNode> {
    try {
      const pkg = await openPackage(input.buffer);
      const document = await readXmlPart(pkg, MAIN_PART);
      const body = firstChild(document, 'w:body');
      if (!body) {
        throw new Error(`${MAIN_PART} has no w:body`);
      }
      return body;
    } catch (error) {
      throw new DocumentParseError(input.filename, errorMessage(error), error);
    }
  }

  private extractTable(
    table: XmlNode,
    tableIndex: number,
    fragments: string[],
    diagnostics: DocxDiagnostics
  ): void {
    let grid: WordTable;
    try {
      grid = new WordTable(table, tableIndex);
    } catch (error) {
      if (!(error instanceof TableStructureError)) throw error;
      diagnostics.skippedTables++;
      debug.table.warn('Table skipped', { table: tableIndex, reason: error.message });
      return;
    }

    grid.rows.forEach((row, rowIndex) => {
      try {
        fragments.push(...grid.resolveRowCells(rowIndex));
      } catch (error) {
        if (!(error instanceof RowStructureError)) throw error;
        debug.table.log('Grid model failed, reading raw markup', { table: tableIndex, row: rowIndex, reason: error.message });

        try {
          fragments.push(...readRowRawCells(row, rowIndex));
          diagnostics.recoveredRows++;
        } catch (fallbackError) {
          if (!(fallbackError instanceof CellFallbackError)) throw fallbackError;
          diagnostics.skippedRows++;
          debug.table.warn('Row skipped', { table: tableIndex, row: rowIndex, reason: fallbackError.message });
        }
      }
    });
  }
}
