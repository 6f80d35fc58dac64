import { Injectable, Logger } from '@nestjs/common';
import { PDFDocument, PDFFont, PDFPage, StandardFonts, rgb } from 'pdf-lib';
import {
  AnswerOutcome,
  OverallResult,
} from '../jobs/interfaces/grading-job.interface';

export interface ReportInput {
  jobId: string;
  attemptId: string;
  outcomes: readonly AnswerOutcome[];
  overall: OverallResult;
  generatedAt: Date;
}

const PAGE_SIZE: [number, number] = [595.28, 841.89]; // A4
const MARGIN = 50;
const BODY_SIZE = 10;
const LINE_GAP = 4;
const NO_SECTION = 'Other';

/**
 * Orders results by section label (unlabelled last), question type, then
 * numeric question id.
 */
export function sortForReport(
  outcomes: readonly AnswerOutcome[],
): AnswerOutcome[] {
  return [...outcomes].sort((a, b) => {
    if (a.section !== b.section) {
      if (a.section === null) return 1;
      if (b.section === null) return -1;
      return a.section.localeCompare(b.section);
    }
    if (a.questionType !== b.questionType) {
      return a.questionType.localeCompare(b.questionType);
    }
    return a.questionId - b.questionId;
  });
}

/** Standard PDF fonts only encode WinAnsi; anything else becomes '?'. */
export function toRenderable(value: string): string {
  return value
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/[–—]/g, '-')
    .replace(/…/g, '...')
    .replace(/[\r\n\t]+/g, ' ')
    .replace(/[^\x20-\x7E\xA0-\xFF]/g, '?');
}

export function wrapText(
  text: string,
  maxWidth: number,
  measure: (candidate: string) => number,
): string[] {
  const words = toRenderable(text).split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (measure(candidate) <= maxWidth || !current) {
      current = candidate;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) {
    lines.push(current);
  }
  return lines;
}

class PageWriter {
  private page: PDFPage;
  private y: number;

  constructor(
    private readonly doc: PDFDocument,
    private readonly font: PDFFont,
    private readonly bold: PDFFont,
  ) {
    this.page = doc.addPage(PAGE_SIZE);
    this.y = PAGE_SIZE[1] - MARGIN;
  }

  get contentWidth(): number {
    return PAGE_SIZE[0] - MARGIN * 2;
  }

  line(text: string, size = BODY_SIZE, useBold = false): void {
    const font = useBold ? this.bold : this.font;
    for (const wrapped of wrapText(text, this.contentWidth, (c) =>
      font.widthOfTextAtSize(c, size),
    )) {
      this.ensureRoom(size);
      this.page.drawText(wrapped, {
        x: MARGIN,
        y: this.y,
        size,
        font,
        color: rgb(0.1, 0.1, 0.1),
      });
      this.y -= size + LINE_GAP;
    }
  }

  gap(points = BODY_SIZE): void {
    this.y -= points;
  }

  private ensureRoom(size: number): void {
    if (this.y - size < MARGIN) {
      this.page = this.doc.addPage(PAGE_SIZE);
      this.y = PAGE_SIZE[1] - MARGIN;
    }
  }
}

@Injectable()
export class ReportRendererService {
  private readonly logger = new Logger(ReportRendererService.name);

  async render(input: ReportInput): Promise<Buffer> {
    const doc = await PDFDocument.create();
    doc.setTitle(`Grading report ${input.attemptId}`);
    doc.setCreationDate(input.generatedAt);

    const writer = new PageWriter(
      doc,
      await doc.embedFont(StandardFonts.Helvetica),
      await doc.embedFont(StandardFonts.HelveticaBold),
    );

    writer.line('Grading Report', 18, true);
    writer.gap();
    writer.line(`Attempt: ${input.attemptId}`);
    writer.line(`Job: ${input.jobId}`);
    writer.line(`Generated: ${input.generatedAt.toISOString()}`);
    writer.gap();
    writer.line(
      `Overall score: ${formatScore(input.overall.score)} (${input.overall.band})`,
      12,
      true,
    );
    writer.line(input.overall.notes);

    let currentSection: string | undefined;
    for (const outcome of sortForReport(input.outcomes)) {
      const section = outcome.section ?? NO_SECTION;
      if (section !== currentSection) {
        currentSection = section;
        writer.gap();
        writer.line(section, 14, true);
      }
      writer.gap(4);
      writer.line(
        `${outcome.questionType} #${outcome.questionId}: ${formatScore(outcome.score)}${
          outcome.fallback ? ' (not graded)' : ''
        }`,
        BODY_SIZE,
        true,
      );
      if (outcome.rationale) {
        writer.line(outcome.rationale);
      }
    }

    const bytes = await doc.save();
    this.logger.log(
      `Rendered report for job ${input.jobId}: ${doc.getPageCount()} page(s), ${bytes.length} bytes`,
    );
    return Buffer.from(bytes);
  }
}

function formatScore(score: number): string {
  return `${Math.round(score * 100)}%`;
}
