import type { DocumentReader } from '@/lib/core/interfaces';
import type { DocumentInput, ExtractionResult, PptxDiagnostics } from '@/lib/core/types';
import {
  openPackage,
  readXmlPart,
  relationshipsPartFor,
  resolvePartTarget,
  type OfficePackage,
} from '@/lib/document-processing/processor';
import { attribute, childElements, childPath, runText, type XmlNode } from '@/lib/document-processing/xml-tree';
import { DocumentParseError, errorMessage } from '@/lib/utils/errors';
import { debug } from '@/lib/utils/debug';
import { splitIntoSegments } from '../nlp/segmenter';

const PPTX_MIME = 'application/vnd.openxmlformats-officedocument.presentationml.presentation';
const PRESENTATION_PART = 'ppt/presentation.xml';

function drawingParagraphText(paragraph: XmlNode): string {
  let text = '';
  for (const child of paragraph.children) {
    if (child.name === 'a:r' || child.name === 'a:fld') {
      for (const t of childElements(child, 'a:t')) text += runText(t);
    } else if (child.name === 'a:br') {
      text += '\v';
    }
  }
  return text;
}

/** Text of a DrawingML text body: paragraphs joined by line breaks. */
function textBodyText(textBody: XmlNode): string {
  return childElements(textBody, 'a:p').map(drawingParagraphText).join('\n');
}

/**
 * PPTX document reader (presentation).
 * Slides in presentation order; per shape, its text frame and then its table cells.
 */
export class PptxReader implements DocumentReader {
  canHandle(input: Pick<DocumentInput, 'filename' | 'mimeType'>): boolean {
    return input.mimeType === PPTX_MIME || input.filename.toLowerCase().endsWith('.pptx');
  }

  getSupportedExtensions(): string[] {
    return ['.pptx', '.PPTX'];
  }

  async extract(input: DocumentInput): Promise<ExtractionResult> {
    const diagnostics: PptxDiagnostics = {
      format: 'pptx',
      slideCount: 0,
      shapeCount: 0,
      tableCount: 0,
    };
    const fragments: string[] = [];

    // No per-table recovery here: any failure makes the whole deck unreadable.
    try {
      const pkg = await openPackage(input.buffer);
      for (const slidePart of await this.listSlideParts(pkg)) {
        const slide = await readXmlPart(pkg, slidePart);
        const shapeTree = childPath(slide, ['p:cSld', 'p:spTree']);
        if (!shapeTree) {
          throw new Error(`${slidePart} has no shape tree`);
        }
        diagnostics.slideCount++;
        this.extractShapes(shapeTree, fragments, diagnostics);
      }
    } catch (error) {
      throw new DocumentParseError(input.filename, errorMessage(error), error);
    }

    const mergedText = fragments.join('\n');
    debug.extract.log('PPTX extracted', { file: input.filename, ...diagnostics });

    return {
      filename: input.filename,
      fragments,
      mergedText,
      segments: splitIntoSegments(mergedText),
      diagnostics,
    };
  }

  getName(): string {
    return 'PptxReader';
  }

  /**
   * Slide part names in p:sldIdLst order.
   */
  private async listSlideParts(pkg: OfficePackage): Promise<string[]> {
    const presentation = await readXmlPart(pkg, PRESENTATION_PART);
    const relationships = await readXmlPart(pkg, relationshipsPartFor(PRESENTATION_PART));

    const targets = new Map<string, string>();
    for (const rel of childElements(relationships, 'Relationship')) {
      const id = attribute(rel, 'Id');
      const target = attribute(rel, 'Target');
      if (id && target) targets.set(id, target);
    }

    const slideIds = childPath(presentation, ['p:sldIdLst']);
    if (!slideIds) return [];

    return childElements(slideIds, 'p:sldId').map(slideId => {
      const relId = attribute(slideId, 'r:id');
      const target = relId ? targets.get(relId) : undefined;
      if (!target) {
        throw new Error(`Slide relationship ${relId ?? '(missing r:id)'} not found`);
      }
      return resolvePartTarget(PRESENTATION_PART, target);
    });
  }

  private extractShapes(container: XmlNode, fragments: string[], diagnostics: PptxDiagnostics): void {
    for (const shape of container.children) {
      switch (shape.name) {
        case 'p:sp': {
          diagnostics.shapeCount++;
          const textBody = childPath(shape, ['p:txBody']);
          if (textBody) fragments.push(textBodyText(textBody));
          break;
        }
        case 'p:graphicFrame': {
          diagnostics.shapeCount++;
          const table = childPath(shape, ['a:graphic', 'a:graphicData', 'a:tbl']);
          if (table) {
            diagnostics.tableCount++;
            this.extractTable(table, fragments);
          }
          break;
        }
        case 'p:grpSp':
          this.extractShapes(shape, fragments, diagnostics);
          break;
        case 'p:pic':
        case 'p:cxnSp':
          diagnostics.shapeCount++;
          break;
        default:
          break;
      }
    }
  }

  private extractTable(table: XmlNode, fragments: string[]): void {
    for (const row of childElements(table, 'a:tr')) {
      for (const cell of childElements(row, 'a:tc')) {
        const textBody = childPath(cell, ['a:txBody']);
        fragments.push(textBody ? textBodyText(textBody) : '');
      }
    }
  }
}
