/**
 * Magic Resume Word Renderer
 *
 * Lays Magic Resume data out as a Word document styled by its global
 * settings. Layout is computed as plain blocks first so it can be checked
 * without opening the document.
 */

import type { Paragraph as DocxParagraph } from 'docx';
import type { DocxModule } from './docxRenderer';
import type {
  BasicInfo,
  EducationEntry,
  ExperienceEntry,
  GlobalSettings,
  MagicResumeData,
  ProjectEntry
} from './magicResumeBuilder';

export type MagicDocxBlock =
  | { kind: 'name'; text: string }
  | { kind: 'title'; text: string }
  | { kind: 'contact'; text: string }
  | { kind: 'section'; text: string }
  | { kind: 'item'; text: string; date: string }
  | { kind: 'note'; text: string }
  | { kind: 'bullet'; text: string }
  | { kind: 'paragraph'; text: string };

export interface HtmlLine {
  text: string;
  bullet: boolean;
}

const FONT = 'Microsoft YaHei';
const MUTED_COLOR = '646464';
const NOTE_COLOR = '505050';
const HEADER_SEPARATOR = '  |  ';

// ============================================================================
// Units
// ============================================================================

/**
 * Settings are in CSS pixels
 */
export function pxToPt(px: number): number {
  return px * 0.58;
}

function halfPoints(pt: number): number {
  return Math.round(pt * 2);
}

function twips(pt: number): number {
  return Math.round(pt * 20);
}

/**
 * "#1a2b3c" → "1A2B3C"; anything else renders black
 */
export function themeColorHex(color: string): string {
  const match = color.trim().match(/^#?([0-9a-f]{6})$/i);
  return match ? match[1].toUpperCase() : '000000';
}

// ============================================================================
// HTML fields
// ============================================================================

function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

function stripTags(html: string): string {
  return decodeEntities(html.replace(/<[^>]+>/g, '')).trim();
}

/**
 * Splits a stored HTML field into its list items and paragraphs, in order.
 * Markup without block tags is split on its tags.
 */
export function htmlToLines(html: string): HtmlLine[] {
  const lines: HtmlLine[] = [];
  for (const match of html.matchAll(/<(li|p)\b[^>]*>([\s\S]*?)<\/\1>/gi)) {
    const text = stripTags(match[2]);
    if (text) {
      lines.push({ text, bullet: match[1].toLowerCase() === 'li' });
    }
  }
  if (lines.length > 0) {
    return lines;
  }

  return decodeEntities(html.replace(/<[^>]+>/g, '\n'))
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
    .map(text => ({ text, bullet: false }));
}

// ============================================================================
// Layout
// ============================================================================

function joinHeader(parts: string[]): string {
  return parts.filter(Boolean).join(HEADER_SEPARATOR);
}

function pushItem(blocks: MagicDocxBlock[], parts: string[], date: string): void {
  const text = joinHeader(parts);
  if (text || date) {
    blocks.push({ kind: 'item', text, date });
  }
}

function pushLines(blocks: MagicDocxBlock[], lines: HtmlLine[]): void {
  for (const line of lines) {
    blocks.push({ kind: line.bullet ? 'bullet' : 'paragraph', text: line.text });
  }
}

function layoutBasic(basic: Partial<BasicInfo>, blocks: MagicDocxBlock[]): void {
  if (basic.name) {
    blocks.push({ kind: 'name', text: basic.name });
  }
  if (basic.title) {
    blocks.push({ kind: 'title', text: basic.title });
  }
  const contact = [basic.email ?? '', basic.phone ?? '', basic.location ?? ''];
  if (contact.some(Boolean)) {
    blocks.push({ kind: 'contact', text: joinHeader(contact) });
  }
}

function educationDate(entry: EducationEntry): string {
  if (!entry.startDate && !entry.endDate) {
    return '';
  }
  return `${entry.startDate.slice(0, 7)} - ${entry.endDate.slice(0, 7)}`;
}

function layoutEducation(title: string, entries: EducationEntry[], blocks: MagicDocxBlock[]): void {
  const visible = entries.filter(e => e.visible);
  if (visible.length === 0) return;

  blocks.push({ kind: 'section', text: title });
  for (const entry of visible) {
    pushItem(blocks, [entry.school, entry.degree, entry.major], educationDate(entry));
    if (entry.gpa) {
      blocks.push({ kind: 'note', text: `GPA: ${entry.gpa}` });
    }
    pushLines(blocks, htmlToLines(entry.description));
  }
}

function layoutExperience(title: string, entries: ExperienceEntry[], blocks: MagicDocxBlock[]): void {
  const visible = entries.filter(e => e.visible);
  if (visible.length === 0) return;

  blocks.push({ kind: 'section', text: title });
  for (const entry of visible) {
    pushItem(blocks, [entry.company, entry.position], entry.date);
    pushLines(blocks, htmlToLines(entry.details));
  }
}

function layoutProjects(title: string, entries: ProjectEntry[], blocks: MagicDocxBlock[]): void {
  const visible = entries.filter(e => e.visible);
  if (visible.length === 0) return;

  blocks.push({ kind: 'section', text: title });
  for (const entry of visible) {
    pushItem(blocks, [entry.name, entry.role], entry.date);
    pushLines(blocks, htmlToLines(entry.description));
  }
}

/**
 * Blocks for the enabled menu sections, in menu order
 */
export function layoutMagicResume(data: MagicResumeData): MagicDocxBlock[] {
  const blocks: MagicDocxBlock[] = [];
  const sections = data.menuSections
    .filter(section => section.enabled)
    .sort((a, b) => a.order - b.order);

  for (const section of sections) {
    switch (section.id) {
      case 'basic':
        layoutBasic(data.basic, blocks);
        break;
      case 'education':
        layoutEducation(section.title, data.education, blocks);
        break;
      case 'experience':
        layoutExperience(section.title, data.experience, blocks);
        break;
      case 'projects':
        layoutProjects(section.title, data.projects, blocks);
        break;
      case 'skills': {
        const lines = htmlToLines(data.skillContent);
        if (lines.length > 0) {
          blocks.push({ kind: 'section', text: section.title });
          pushLines(blocks, lines);
        }
        break;
      }
    }
  }

  return blocks;
}

// ============================================================================
// Rendering
// ============================================================================

function blockParagraph(docx: DocxModule, settings: GlobalSettings, block: MagicDocxBlock): DocxParagraph {
  const { Paragraph, TextRun, AlignmentType, BorderStyle, TabStopType, TabStopPosition } = docx;
  const base = pxToPt(settings.baseFontSize);
  const theme = themeColorHex(settings.themeColor);

  const run = (text: string, size: number, style: { bold?: boolean; color?: string } = {}) =>
    new TextRun({ text, size: halfPoints(size), bold: style.bold, color: style.color, font: FONT });

  switch (block.kind) {
    case 'name':
      return new Paragraph({
        children: [run(block.text, pxToPt(settings.headerSize) * 1.3, { bold: true, color: theme })],
        alignment: AlignmentType.CENTER,
        spacing: { after: twips(1) }
      });
    case 'title':
      return new Paragraph({
        children: [run(block.text, base, { color: MUTED_COLOR })],
        alignment: AlignmentType.CENTER,
        spacing: { after: twips(2) }
      });
    case 'contact':
      return new Paragraph({
        children: [run(block.text, base * 0.85)],
        alignment: AlignmentType.CENTER,
        spacing: { after: twips(4) }
      });
    case 'section':
      return new Paragraph({
        children: [run(block.text, pxToPt(settings.headerSize), { bold: true, color: theme })],
        spacing: { before: twips(4), after: twips(1) },
        border: { bottom: { style: BorderStyle.SINGLE, size: 6, space: 1, color: theme } }
      });
    case 'item': {
      const size = pxToPt(settings.subheaderSize);
      if (!block.date) {
        return new Paragraph({
          children: [run(block.text, size, { bold: true })],
          spacing: { before: twips(3) }
        });
      }
      // the date sits on a right tab stop at the margin
      return new Paragraph({
        children: [run(block.text, size, { bold: true }), run(`\t${block.date}`, size * 0.85, { color: MUTED_COLOR })],
        tabStops: [{ type: TabStopType.RIGHT, position: TabStopPosition.MAX }],
        spacing: { before: twips(3) }
      });
    }
    case 'note':
      return new Paragraph({ children: [run(block.text, base * 0.85, { color: NOTE_COLOR })] });
    case 'bullet':
      return new Paragraph({ children: [run(block.text, base)], bullet: { level: 0 } });
    case 'paragraph':
      return new Paragraph({ children: [run(block.text, base)], spacing: { after: twips(4) } });
  }
}

export function buildMagicResumeParagraphs(docx: DocxModule, data: MagicResumeData): DocxParagraph[] {
  return layoutMagicResume(data).map(block => blockParagraph(docx, data.globalSettings, block));
}

export async function renderMagicResumeDocx(docx: DocxModule, data: MagicResumeData): Promise<Buffer> {
  const document = new docx.Document({
    creator: data.basic.name || 'resume-agent',
    title: data.title,
    sections: [{
      properties: {
        page: {
          margin: {
            top: docx.convertMillimetersToTwip(10),
            bottom: docx.convertMillimetersToTwip(10),
            left: docx.convertMillimetersToTwip(12.7),
            right: docx.convertMillimetersToTwip(12.7)
          }
        }
      },
      children: buildMagicResumeParagraphs(docx, data)
    }]
  });

  return docx.Packer.toBuffer(document);
}
