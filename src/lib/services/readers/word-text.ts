/**
 * WordprocessingML text helpers.
 * Two layers over the same element tree:
 *   - visible text of paragraphs and cells (what a reader of the document sees)
 *   - raw-markup walk of a table row (every w:t under w:tc/w:p, no grid arithmetic)
 */

import { attribute, childElements, descendants, runText, type XmlNode } from '@/lib/document-processing/xml-tree';
import { CellFallbackError } from '@/lib/utils/errors';

// Inline wrappers whose runs are part of the paragraph's visible text
const TRANSPARENT_WRAPPERS = new Set([
  'w:hyperlink',
  'w:ins',
  'w:moveTo',
  'w:smartTag',
  'w:fldSimple',
  'w:customXml',
  'w:sdt',
  'w:sdtContent',
]);

function runContentText(run: XmlNode): string {
  let text = '';
  for (const child of run.children) {
    switch (child.name) {
      case 'w:t':
        text += runText(child);
        break;
      case 'w:tab':
      case 'w:ptab':
        text += '\t';
        break;
      case 'w:br': {
        const type = attribute(child, 'w:type');
        if (!type || type === 'textWrapping') text += '\n';
        break;
      }
      case 'w:cr':
        text += '\n';
        break;
      case 'w:noBreakHyphen':
        text += '-';
        break;
      default:
        break;
    }
  }
  return text;
}

function inlineText(node: XmlNode): string {
  let text = '';
  for (const child of node.children) {
    if (child.name === 'w:r') {
      text += runContentText(child);
    } else if (TRANSPARENT_WRAPPERS.has(child.name)) {
      text += inlineText(child);
    }
  }
  return text;
}

/**
 * Visible text of a w:p element. Deleted runs (w:del) are not visible.
 */
export function paragraphText(paragraph: XmlNode): string {
  return inlineText(paragraph);
}

/**
 * Visible text of a w:tc element: its own paragraphs joined by line breaks.
 * Nested tables are not part of the cell's text.
 */
export function cellText(cell: XmlNode): string {
  return childElements(cell, 'w:p').map(paragraphText).join('\n');
}

/**
 * Raw-markup read of a table row, bypassing the grid model.
 * One entry per w:tc: each w:p's w:t nodes concatenated, paragraphs joined by line breaks.
 * A cell without paragraphs reads as "".
 * @throws CellFallbackError when the row has no cells.
 */
export function readRowRawCells(row: XmlNode, rowIndex: number): string[] {
  const cells = childElements(row, 'w:tc');
  if (cells.length === 0) {
    throw new CellFallbackError(`Row ${rowIndex} has no w:tc elements`, rowIndex);
  }

  return cells.map(cell =>
    childElements(cell, 'w:p')
      .map(paragraph => descendants(paragraph, 'w:t').map(runText).join(''))
      .join('\n')
  );
}
