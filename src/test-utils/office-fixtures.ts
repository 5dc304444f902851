/**
 * In-memory .docx / .pptx builders for tests.
 * Only the parts the readers open are written.
 */

import JSZip from 'jszip';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const A_NS = 'http://schemas.openxmlformats.org/drawingml/2006/main';
const P_NS = 'http://schemas.openxmlformats.org/presentationml/2006/main';
const R_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const PKG_REL_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';
const SLIDE_REL_TYPE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide';

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

// ============================================
// WordprocessingML
// ============================================

export function wRun(text: string): string {
  return `<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`;
}

export function wParagraph(...runs: string[]): string {
  return `<w:p><w:pPr><w:pStyle w:val="Normal"/></w:pPr>${runs.map(wRun).join('')}</w:p>`;
}

export function wCell(text: string, properties = ''): string {
  const tcPr = properties ? `<w:tcPr>${properties}</w:tcPr>` : '';
  return `<w:tc>${tcPr}${wParagraph(text)}</w:tc>`;
}

export function wRow(cells: string[], rowProperties = ''): string {
  const trPr = rowProperties ? `<w:trPr>${rowProperties}</w:trPr>` : '';
  return `<w:tr>${trPr}${cells.join('')}</w:tr>`;
}

/** Table with `columns` grid columns, or no w:tblGrid at all when columns is null. */
export function wTable(rows: string[], columns: number | null): string {
  const grid = columns === null ? '' : `<w:tblGrid>${'<w:gridCol w:w="2400"/>'.repeat(columns)}</w:tblGrid>`;
  return `<w:tbl><w:tblPr><w:tblW w:w="0" w:type="auto"/></w:tblPr>${grid}${rows.join('')}</w:tbl>`;
}

export function documentXml(bodyXml: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="${W_NS}" xmlns:r="${R_NS}"><w:body>${bodyXml}<w:sectPr/></w:body></w:document>`;
}

export async function buildDocx(bodyXml: string): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('[Content_Types].xml', '<?xml version="1.0"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>');
  zip.file('word/document.xml', documentXml(bodyXml));
  return zip.generateAsync({ type: 'nodebuffer' });
}

// ============================================
// PresentationML
// ============================================

function aParagraph(text: string): string {
  return `<a:p><a:r><a:rPr lang="en-US" dirty="0"/><a:t>${escapeXml(text)}</a:t></a:r></a:p>`;
}

export function pTextShape(...paragraphs: string[]): string {
  return `<p:sp><p:nvSpPr><p:cNvPr id="2" name="TextBox"/><p:cNvSpPr txBox="1"/><p:nvPr/></p:nvSpPr><p:spPr/>` +
    `<p:txBody><a:bodyPr/><a:lstStyle/>${paragraphs.map(aParagraph).join('')}</p:txBody></p:sp>`;
}

export function pPicture(): string {
  return '<p:pic><p:nvPicPr><p:cNvPr id="5" name="Picture"/><p:cNvPicPr/><p:nvPr/></p:nvPicPr><p:blipFill/><p:spPr/></p:pic>';
}

export function pTable(rows: string[][]): string {
  const columns = rows[0]?.length ?? 0;
  const grid = `<a:tblGrid>${'<a:gridCol w="914400"/>'.repeat(columns)}</a:tblGrid>`;
  const body = rows
    .map(cells => `<a:tr h="370840">${cells
      .map(text => `<a:tc><a:txBody><a:bodyPr/><a:lstStyle/>${aParagraph(text)}</a:txBody><a:tcPr/></a:tc>`)
      .join('')}</a:tr>`)
    .join('');
  return `<p:graphicFrame><p:nvGraphicFramePr><p:cNvPr id="4" name="Table"/><p:cNvGraphicFramePr/><p:nvPr/></p:nvGraphicFramePr>` +
    `<p:xfrm/><a:graphic><a:graphicData uri="http://schemas.openxmlformats.org/drawingml/2006/table">` +
    `<a:tbl><a:tblPr firstRow="1"/>${grid}${body}</a:tbl></a:graphicData></a:graphic></p:graphicFrame>`;
}

export function pGroup(...shapes: string[]): string {
  return `<p:grpSp><p:nvGrpSpPr><p:cNvPr id="6" name="Group"/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>${shapes.join('')}</p:grpSp>`;
}

export function slideXml(shapes: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<p:sld xmlns:a="${A_NS}" xmlns:p="${P_NS}" xmlns:r="${R_NS}"><p:cSld><p:spTree>` +
    `<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>` +
    `${shapes.join('')}</p:spTree></p:cSld></p:sld>`;
}

export interface PptxOptions {
  /** Slide indexes in presentation order; defaults to file order */
  order?: number[];
  /** Raw slide XML per slide index, replacing the generated part */
  rawSlides?: Record<number, string>;
}

/**
 * Deck with one slide part per entry of `slides` (each entry: the slide's shapes).
 */
export async function buildPptx(slides: string[][], options: PptxOptions = {}): Promise<Buffer> {
  const zip = new JSZip();
  const order = options.order ?? slides.map((_, i) => i);

  const sldIds = order
    .map((slideIndex, position) => `<p:sldId id="${256 + position}" r:id="rId${slideIndex + 10}"/>`)
    .join('');
  zip.file('[Content_Types].xml', '<?xml version="1.0"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>');
  zip.file(
    'ppt/presentation.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<p:presentation xmlns:a="${A_NS}" xmlns:p="${P_NS}" xmlns:r="${R_NS}"><p:sldIdLst>${sldIds}</p:sldIdLst><p:sldSz cx="12192000" cy="6858000"/></p:presentation>`
  );

  const rels = slides
    .map((_, i) => `<Relationship Id="rId${i + 10}" Type="${SLIDE_REL_TYPE}" Target="slides/slide${i + 1}.xml"/>`)
    .join('');
  zip.file(
    'ppt/_rels/presentation.xml.rels',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="${PKG_REL_NS}">${rels}</Relationships>`
  );

  slides.forEach((shapes, i) => {
    zip.file(`ppt/slides/slide${i + 1}.xml`, options.rawSlides?.[i] ?? slideXml(shapes));
  });

  return zip.generateAsync({ type: 'nodebuffer' });
}
