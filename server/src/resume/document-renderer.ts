import {
  AlignmentType, BorderStyle, Document, Packer, Paragraph, Table, TableCell, TableRow, TextRun,
  WidthType,
} from 'docx';
import type { ContentPayload } from './schemas.js';
import { SECTION_IDS, sectionHeading, type SectionId } from './sections.js';

// ---------------------------------------------------------------------------
// Page geometry (one US Letter page, tight margins)
// ---------------------------------------------------------------------------

const FONT = 'Poppins';
const TITLE_SIZE = 44;    // 22pt
const HEADING_SIZE = 22;  // 11pt
const BULLET_SIZE = 20;   // 10pt
const BULLET_GLYPH = '•';

const TWIPS_PER_INCH = 1440;
const inches = (value: number): number => Math.round(value * TWIPS_PER_INCH);

const PAGE_WIDTH = inches(8.5);
const PAGE_HEIGHT = inches(11);
const PAGE_MARGIN = inches(0.5);
const BULLET_INDENT = inches(0.15);

export const GRID_COLUMNS = 2;
export const GRID_ROWS = Math.ceil(SECTION_IDS.length / GRID_COLUMNS);

const COLUMN_WIDTH = Math.floor((PAGE_WIDTH - 2 * PAGE_MARGIN) / GRID_COLUMNS);

const NO_BORDER = { style: BorderStyle.NONE, size: 0, color: 'auto' };

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

export interface ResumeLayoutCell {
  sectionId: SectionId;
  heading: string;
  row: number;
  column: number;
  bullets: readonly string[];
}

/**
 * Place each section in the grid, row-major: section i goes to
 * (i div 2, i mod 2). Depends only on SECTION_IDS order.
 */
export function buildResumeLayout(payload: ContentPayload): ResumeLayoutCell[] {
  return SECTION_IDS.map((sectionId, index) => ({
    sectionId,
    heading: sectionHeading(sectionId),
    row: Math.floor(index / GRID_COLUMNS),
    column: index % GRID_COLUMNS,
    bullets: payload[sectionId],
  }));
}

// ---------------------------------------------------------------------------
// Paragraph builders
// ---------------------------------------------------------------------------

function titleParagraph(name: string): Paragraph {
  return new Paragraph({
    alignment: AlignmentType.CENTER,
    children: [new TextRun({ text: name, font: FONT, size: TITLE_SIZE })],
  });
}

function headingParagraph(text: string): Paragraph {
  return new Paragraph({
    children: [new TextRun({ text, bold: true, font: FONT, size: HEADING_SIZE })],
  });
}

function bulletParagraph(text: string): Paragraph {
  return new Paragraph({
    indent: { left: BULLET_INDENT },
    spacing: { after: 0 },
    children: [new TextRun({ text: `${BULLET_GLYPH} ${text}`, font: FONT, size: BULLET_SIZE })],
  });
}

function sectionCell(cell: ResumeLayoutCell): TableCell {
  return new TableCell({
    width: { size: COLUMN_WIDTH, type: WidthType.DXA },
    children: [
      headingParagraph(cell.heading),
      ...cell.bullets.map((bullet) => bulletParagraph(bullet)),
    ],
  });
}

function sectionGrid(cells: ResumeLayoutCell[]): Table {
  const rows: TableRow[] = [];
  for (let row = 0; row < GRID_ROWS; row++) {
    const rowCells = cells
      .filter((cell) => cell.row === row)
      .sort((a, b) => a.column - b.column)
      .map(sectionCell);
    rows.push(new TableRow({ children: rowCells }));
  }

  return new Table({
    width: { size: COLUMN_WIDTH * GRID_COLUMNS, type: WidthType.DXA },
    columnWidths: Array.from({ length: GRID_COLUMNS }, () => COLUMN_WIDTH),
    borders: {
      top: NO_BORDER,
      bottom: NO_BORDER,
      left: NO_BORDER,
      right: NO_BORDER,
      insideHorizontal: NO_BORDER,
      insideVertical: NO_BORDER,
    },
    rows,
  });
}

// ---------------------------------------------------------------------------
// Resume DOCX
// ---------------------------------------------------------------------------

export function renderResumeDocument(payload: ContentPayload): Document {
  return new Document({
    title: `${payload.name} Resume`,
    creator: 'onepage-resume',
    description: `One-page resume for ${payload.name}`,
    sections: [
      {
        properties: {
          page: {
            size: { width: PAGE_WIDTH, height: PAGE_HEIGHT },
            margin: { top: PAGE_MARGIN, right: PAGE_MARGIN, bottom: PAGE_MARGIN, left: PAGE_MARGIN },
          },
        },
        children: [
          titleParagraph(payload.name),
          sectionGrid(buildResumeLayout(payload)),
        ],
      },
    ],
  });
}

export async function renderResumeDocx(payload: ContentPayload): Promise<Buffer> {
  return Packer.toBuffer(renderResumeDocument(payload));
}
