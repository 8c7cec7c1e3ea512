import { jsPDF } from "jspdf";
import autoTable from "jspdf-autotable";
import { formatFileTimestamp } from "@/lib/format";
import type { GeneratedReport, ReportBlock } from "@/types/report";

type Rgb = [number, number, number];

const MARGIN_X = 14;
const CONTENT_TOP = 34;
const BOTTOM_MARGIN = 20;
const LINE_HEIGHT = 5; // approx mm per line at font size 11

const TEXT: Rgb = [15, 23, 42]; // slate-900
const MUTED: Rgb = [100, 116, 139]; // slate-500
const BRAND: Rgb = [5, 150, 105]; // teal-600

type PdfCursor = {
  doc: jsPDF;
  appTitle: string;
  y: number;
};

function drawHeader(doc: jsPDF, appTitle: string) {
  doc.setFillColor(...BRAND);
  doc.rect(0, 0, doc.internal.pageSize.getWidth(), 24, "F");
  doc.setTextColor(255, 255, 255);
  doc.setFontSize(18);
  doc.setFont("helvetica", "bold");
  doc.text(appTitle, MARGIN_X, 16);
}

function drawFooter(doc: jsPDF) {
  const pageCount = doc.getNumberOfPages();
  for (let i = 1; i <= pageCount; i++) {
    doc.setPage(i);
    doc.setFont("helvetica", "normal");
    doc.setFontSize(9);
    doc.setTextColor(100);
    doc.text(
      `Page ${i} / ${pageCount}`,
      doc.internal.pageSize.getWidth() - 28,
      doc.internal.pageSize.getHeight() - 10
    );
  }
}

function ensureSpace(cursor: PdfCursor, needed: number) {
  const limit = cursor.doc.internal.pageSize.getHeight() - BOTTOM_MARGIN;
  if (cursor.y + needed > limit) {
    cursor.doc.addPage();
    drawHeader(cursor.doc, cursor.appTitle);
    cursor.y = CONTENT_TOP;
  }
}

function writeLines(
  cursor: PdfCursor,
  text: string,
  x: number,
  maxWidth: number,
  align: "left" | "center" = "left"
) {
  const { doc } = cursor;
  const lines: string[] = doc.splitTextToSize(text, maxWidth);
  ensureSpace(cursor, lines.length * LINE_HEIGHT);
  const anchorX = align === "center" ? doc.internal.pageSize.getWidth() / 2 : x;
  doc.text(lines, anchorX, cursor.y, { align });
  cursor.y += lines.length * LINE_HEIGHT;
}

function drawBlock(cursor: PdfCursor, block: ReportBlock) {
  const { doc } = cursor;
  const contentWidth = doc.internal.pageSize.getWidth() - MARGIN_X * 2;

  switch (block.type) {
    case "heading": {
      doc.setTextColor(...TEXT);
      doc.setFont("helvetica", "bold");
      if (block.level === 0) {
        doc.setFontSize(18);
        ensureSpace(cursor, 10);
        doc.text(block.text, doc.internal.pageSize.getWidth() / 2, cursor.y, {
          align: "center",
        });
        cursor.y += 9;
      } else {
        doc.setFontSize(14);
        ensureSpace(cursor, 16);
        cursor.y += 5;
        doc.text(block.text, MARGIN_X, cursor.y);
        cursor.y += 7;
      }
      return;
    }
    case "paragraph": {
      doc.setFont("helvetica", "normal");
      doc.setFontSize(11);
      doc.setTextColor(...(block.align === "center" ? MUTED : TEXT));
      writeLines(cursor, block.text, MARGIN_X, contentWidth, block.align ?? "left");
      cursor.y += 1;
      return;
    }
    case "bullet": {
      const indent = MARGIN_X + 4 + block.level * 6;
      doc.setFont("helvetica", "normal");
      doc.setFontSize(11);
      doc.setTextColor(...TEXT);
      ensureSpace(cursor, LINE_HEIGHT);
      doc.setFillColor(...TEXT);
      doc.circle(indent, cursor.y - 1.2, 0.8, "F");
      writeLines(cursor, block.text, indent + 4, contentWidth - (indent + 4 - MARGIN_X));
      return;
    }
    case "table": {
      let finalY = cursor.y;
      autoTable(doc, {
        startY: cursor.y,
        margin: { top: CONTENT_TOP, bottom: BOTTOM_MARGIN, left: MARGIN_X, right: MARGIN_X },
        headStyles: { fillColor: BRAND, textColor: 255 },
        styles: { fontSize: 10 },
        head: [block.header],
        body: block.rows,
        didDrawPage: (data) => {
          if (data.pageNumber > 1) drawHeader(doc, cursor.appTitle);
          finalY = data.cursor?.y ?? finalY;
        },
      });
      cursor.y = finalY + 6;
      return;
    }
  }
}

export function createReportDocument(
  report: GeneratedReport,
  appTitle: string
): jsPDF {
  const doc = new jsPDF("p", "mm", "a4");
  doc.setProperties({
    title: report.title,
    subject: `Sales report for ${report.reportDate}`,
    creator: appTitle,
  });
  drawHeader(doc, appTitle);

  const cursor: PdfCursor = { doc, appTitle, y: CONTENT_TOP };
  for (const block of report.blocks) {
    drawBlock(cursor, block);
  }

  drawFooter(doc);
  return doc;
}

export function renderReportPdf(report: GeneratedReport, appTitle: string): ArrayBuffer {
  return createReportDocument(report, appTitle).output("arraybuffer");
}

export function buildReportFilename(weekNumber: number, at: Date): string {
  return `Week${weekNumber}_Sales_Report_${formatFileTimestamp(at)}.pdf`;
}
