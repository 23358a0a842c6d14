import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import PDFDocument from 'pdfkit';
import { AppLoggerService } from '../common/logger/app-logger.service';
import {
  computeColumns,
  distributeSections,
  REPORT_LAYOUTS,
  ReportLayout,
  ReportLayoutName,
} from './report-layout';
import { stripLeadingHeading, toPrintableText } from './report-text.util';

export interface ReportInput {
  domain: string;
  domainDisplayName: string;
  problem: string;
  ruleBasedSummary: string;
  aiBrief?: string;
  companyName: string;
  industry: string;
  revenue?: string;
  employees?: string;
}

interface ReportSection {
  title: string;
  body: string;
  small: boolean;
}

const DEFAULT_PRODUCT_NAME = 'Bivenue Copilot';
const AI_BRIEF_PLACEHOLDER =
  'AI deep-dive was not generated for this brief. Run the diagnosis with the AI brief enabled to include it.';

@Injectable()
export class PdfReportService {
  private readonly logger = new Logger(PdfReportService.name);
  private readonly productName: string;
  private readonly logoPath: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly appLoggerService: AppLoggerService,
  ) {
    this.productName =
      this.configService.get<string>('REPORT_PRODUCT_NAME') ||
      DEFAULT_PRODUCT_NAME;
    this.logoPath = this.configService.get<string>('REPORT_LOGO_PATH') || '';
  }

  /**
   * 한 페이지 컨설팅 브리프 PDF 를 생성합니다
   */
  async render(
    input: ReportInput,
    layoutName: ReportLayoutName = 'classic',
  ): Promise<Buffer> {
    const layout = REPORT_LAYOUTS[layoutName];
    const startTime = Date.now();

    const buffer = await new Promise<Buffer>((resolve, reject) => {
      const doc = new PDFDocument({
        size: layout.size,
        layout: layout.orientation,
        margin: 0,
        info: {
          Title: `${this.productName} - ${input.domainDisplayName} Consulting Brief`,
          Author: this.productName,
          Subject: input.companyName,
          CreationDate: new Date(),
        },
      });

      const chunks: Buffer[] = [];
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      try {
        this.drawHeader(doc, layout, input);
        this.drawColumns(doc, layout, this.buildSections(input));
        this.drawFooter(doc, layout);
        doc.end();
      } catch (error) {
        reject(error);
      }
    });

    this.appLoggerService.logReportGenerated({
      domain: input.domain,
      layout: layout.name,
      sizeBytes: buffer.length,
      durationMs: Date.now() - startTime,
    });

    return buffer;
  }

  private buildSections(input: ReportInput): ReportSection[] {
    const aiBrief = input.aiBrief?.trim()
      ? toPrintableText(stripLeadingHeading(input.aiBrief))
      : AI_BRIEF_PLACEHOLDER;

    return [
      {
        title: 'Mission-critical priority',
        body: `Mission-critical priority:\n${input.domainDisplayName}\n\nChallenge:\n${input.problem.trim() || '-'}`,
        small: false,
      },
      {
        title: 'How we helped',
        body: toPrintableText(input.ruleBasedSummary),
        small: false,
      },
      {
        title: 'Outcome',
        body: `Outcome & AI deep-dive insights:\n\n${aiBrief}`,
        small: true,
      },
    ];
  }

  private drawHeader(
    doc: PDFKit.PDFDocument,
    layout: ReportLayout,
    input: ReportInput,
  ): void {
    const pageWidth = doc.page.width;
    const { headerHeight, margin, fontSizes } = layout;

    doc.rect(0, 0, pageWidth, headerHeight).fill(layout.bannerColor);

    const logoBox: [number, number] = [120, headerHeight - 30];
    let titleX = margin;

    if (this.logoPath) {
      try {
        doc.image(this.logoPath, margin, 15, { fit: logoBox });
        titleX = margin + logoBox[0] + 15;
      } catch (error) {
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Skipping report logo ${this.logoPath}: ${errorMessage}`,
        );
      }
    }

    // 회사 프로필 카드 (헤더 오른쪽)
    const cardWidth = Math.min(210, pageWidth * 0.3);
    const cardX = pageWidth - cardWidth - margin;
    const cardY = 10;
    const titleWidth = cardX - titleX - 10;

    doc
      .fillColor('#FFFFFF')
      .font('Helvetica-Bold')
      .fontSize(fontSizes.title)
      .text(this.productName, titleX, 20, {
        width: titleWidth,
        lineBreak: false,
      });
    doc
      .font('Helvetica')
      .fontSize(fontSizes.subtitle)
      .text(
        `${input.domainDisplayName} Consulting Brief`,
        titleX,
        20 + fontSizes.title + 8,
        { width: titleWidth, lineBreak: false },
      );

    doc
      .roundedRect(cardX, cardY, cardWidth, headerHeight - 2 * cardY, 8)
      .fill('#FFFFFF');

    const profileLines = [
      `Name: ${input.companyName}`,
      `Industry: ${input.industry}`,
      ...(input.revenue ? [`Revenue: ${input.revenue}`] : []),
      ...(input.employees ? [`Employees: ${input.employees}`] : []),
    ];

    doc
      .fillColor(layout.bannerColor)
      .font('Helvetica-Bold')
      .fontSize(fontSizes.sectionTitle)
      .text('Company Profile', cardX + 10, cardY + 6, {
        width: cardWidth - 20,
        lineBreak: false,
      });
    doc
      .fillColor(layout.textColor)
      .font('Helvetica')
      .fontSize(fontSizes.small)
      .text(
        profileLines.join('\n'),
        cardX + 10,
        cardY + 10 + fontSizes.sectionTitle,
        {
          width: cardWidth - 20,
          height: headerHeight - 2 * cardY - fontSizes.sectionTitle - 14,
          ellipsis: true,
        },
      );

    // 헤더 하단 강조선
    doc.rect(0, headerHeight, pageWidth, 3).fill(layout.accentColor);
  }

  private drawColumns(
    doc: PDFKit.PDFDocument,
    layout: ReportLayout,
    sections: ReportSection[],
  ): void {
    const frames = computeColumns(layout, doc.page.width);
    const columns = distributeSections(sections, frames.length);
    const bottom = doc.page.height - 40;
    const top = layout.headerHeight + 18;

    columns.forEach((columnSections, index) => {
      const frame = frames[index];
      let y = top;

      for (const section of columnSections) {
        if (y >= bottom) {
          break;
        }
        y = this.drawSection(
          doc,
          layout,
          section,
          frame.x,
          y,
          frame.width,
          bottom,
        );
      }
    });
  }

  /**
   * 섹션 제목, 강조선, 본문을 그리고 다음 y 위치를 반환합니다
   */
  private drawSection(
    doc: PDFKit.PDFDocument,
    layout: ReportLayout,
    section: ReportSection,
    x: number,
    y: number,
    width: number,
    bottom: number,
  ): number {
    const { fontSizes } = layout;

    doc
      .fillColor(layout.bannerColor)
      .font('Helvetica-Bold')
      .fontSize(fontSizes.sectionTitle)
      .text(section.title, x, y, { width, lineBreak: false });

    const lineY = y + fontSizes.sectionTitle + 4;
    doc.rect(x, lineY, width, 2).fill(layout.accentColor);

    const bodyY = lineY + 8;
    doc
      .fillColor(layout.textColor)
      .font('Helvetica')
      .fontSize(section.small ? fontSizes.small : fontSizes.body)
      .text(section.body, x, bodyY, {
        width,
        height: Math.max(bottom - bodyY, 0),
        ellipsis: true,
        lineGap: 2,
      });

    return Math.min(doc.y + 14, bottom);
  }

  private drawFooter(doc: PDFKit.PDFDocument, layout: ReportLayout): void {
    const footerText = `This brief was generated by ${this.productName} – AI-assisted Finance Transformation Advisor.`;

    doc
      .fillColor(layout.bannerColor)
      .font('Helvetica')
      .fontSize(layout.fontSizes.small)
      .text(footerText, layout.margin, doc.page.height - 24, {
        width: doc.page.width - 2 * layout.margin,
        align: 'center',
        lineBreak: false,
      });
  }
}
