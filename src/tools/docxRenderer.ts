/**
 * Word Renderer
 *
 * Renders resume Markdown into a .docx buffer with the docx library.
 * The library is loaded on demand so the generator can skip Word output
 * when it is not installed.
 */

import type { Paragraph as DocxParagraph, TextRun as DocxTextRun } from 'docx';

export type DocxModule = typeof import('docx');

export type DocxLoader = () => Promise<DocxModule>;

export const loadDocxModule: DocxLoader = () => import('docx');

export interface DocxDocumentOptions {
  markdown: string;
  candidateName?: string;
}

/**
 * Splits a line into runs, bolding **marked** spans
 */
function inlineRuns(docx: DocxModule, text: string, bold = false): DocxTextRun[] {
  const runs: DocxTextRun[] = [];
  let last = 0;
  for (const match of text.matchAll(/\*\*(.+?)\*\*/g)) {
    const index = match.index ?? 0;
    if (index > last) {
      runs.push(new docx.TextRun({ text: text.slice(last, index), bold }));
    }
    runs.push(new docx.TextRun({ text: match[1], bold: true }));
    last = index + match[0].length;
  }
  if (last < text.length || runs.length === 0) {
    runs.push(new docx.TextRun({ text: text.slice(last), bold }));
  }
  return runs;
}

export function buildDocxParagraphs(docx: DocxModule, options: DocxDocumentOptions): DocxParagraph[] {
  const { Paragraph, HeadingLevel, AlignmentType, TextRun } = docx;
  const children: DocxParagraph[] = [];

  const name = options.candidateName?.trim();
  if (name) {
    children.push(new Paragraph({
      children: [new TextRun({ text: name, bold: true, size: 36 })],
      alignment: AlignmentType.CENTER,
      spacing: { after: 200 }
    }));
  }

  for (const raw of options.markdown.split('\n')) {
    const line = raw.trim();

    if (line.startsWith('### ') || /^#{4,6}\s/.test(line)) {
      children.push(new Paragraph({
        text: line.replace(/^#+\s+/, ''),
        heading: HeadingLevel.HEADING_3,
        spacing: { after: 100 }
      }));
    } else if (line.startsWith('## ')) {
      children.push(new Paragraph({
        text: line.substring(3).trim(),
        heading: HeadingLevel.HEADING_2,
        spacing: { after: 150 }
      }));
    } else if (line.startsWith('# ')) {
      children.push(new Paragraph({
        text: line.substring(2).trim(),
        heading: HeadingLevel.HEADING_1,
        spacing: { after: 200 }
      }));
    } else if (/^[-•]/.test(line) || /^\*\s/.test(line)) {
      children.push(new Paragraph({
        children: inlineRuns(docx, line.slice(1).trim()),
        bullet: { level: 0 },
        spacing: { after: 50 }
      }));
    } else if (/^\*\*[^*]+\*\*$/.test(line)) {
      children.push(new Paragraph({
        children: [new TextRun({ text: line.slice(2, -2), bold: true })],
        spacing: { after: 50 }
      }));
    } else if (line === '') {
      children.push(new Paragraph({ text: '', spacing: { after: 100 } }));
    } else {
      children.push(new Paragraph({
        children: inlineRuns(docx, line),
        spacing: { after: 50 }
      }));
    }
  }

  return children;
}

export async function renderDocx(docx: DocxModule, options: DocxDocumentOptions): Promise<Buffer> {
  const document = new docx.Document({
    creator: options.candidateName?.trim() || 'resume-agent',
    title: 'Resume',
    sections: [{
      properties: {},
      children: buildDocxParagraphs(docx, options)
    }]
  });

  return docx.Packer.toBuffer(document);
}
