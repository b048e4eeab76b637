/**
 * Markdown Sections
 *
 * Splits resume Markdown into headed sections and recognises the usual
 * resume section names (English and Chinese).
 */

export type SectionId =
  | 'summary'
  | 'experience'
  | 'education'
  | 'skills'
  | 'projects'
  | 'certifications'
  | 'awards'
  | 'contact';

const SECTION_ALIASES: Record<SectionId, string[]> = {
  summary: ['summary', 'profile', 'objective', 'about', 'about me', 'professional summary', '个人简介', '自我评价', '个人总结'],
  experience: ['experience', 'work experience', 'professional experience', 'employment', 'employment history', 'work history', '工作经历', '工作经验', '实习经历'],
  education: ['education', 'academic background', '教育经历', '教育背景'],
  skills: ['skills', 'technical skills', 'core skills', 'skills & tools', '专业技能', '技能', '技能特长'],
  projects: ['projects', 'project experience', 'selected projects', '项目经历', '项目经验'],
  certifications: ['certifications', 'certificates', 'licenses', '证书', '资格证书'],
  awards: ['awards', 'honors', 'honours', 'achievements', '获奖', '荣誉', '获奖经历'],
  contact: ['contact', 'contact information', 'contact info', '联系方式']
};

const SECTION_IDS: SectionId[] = [
  'summary',
  'experience',
  'education',
  'skills',
  'projects',
  'certifications',
  'awards',
  'contact'
];

const ALIAS_LOOKUP = new Map<string, SectionId>();
for (const id of SECTION_IDS) {
  for (const alias of SECTION_ALIASES[id]) {
    ALIAS_LOOKUP.set(alias, id);
  }
}

export const CJK_PATTERN = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af]/;

export interface MarkdownSection {
  /** Heading text without markers, or null for content before the first heading */
  heading: string | null;
  id: SectionId | null;
  lines: string[];
}

const HEADING_PATTERN = /^(#{1,6})\s+(.*)$/;
const BULLET_PATTERN = /^(?:[-*•]|\d+[.)])\s+/;

export function isBulletLine(line: string): boolean {
  return BULLET_PATTERN.test(line.trim());
}

/**
 * Removes a leading bullet marker
 */
export function stripBullet(line: string): string {
  return line.trim().replace(BULLET_PATTERN, '').trim();
}

/**
 * Maps heading text to a known section, ignoring case, emphasis and a trailing colon
 */
export function identifySection(text: string): SectionId | null {
  const key = text
    .replace(/\*\*|__/g, '')
    .replace(/[:：]\s*$/, '')
    .trim()
    .toLowerCase();
  return ALIAS_LOOKUP.get(key) ?? null;
}

/**
 * Returns the heading text when the line is a Markdown heading, or a short
 * plain line (ALL CAPS, bold, or colon-terminated) naming a known section.
 */
export function headingText(line: string): string | null {
  const trimmed = line.trim();
  const markdown = trimmed.match(HEADING_PATTERN);
  if (markdown) {
    return markdown[2].trim();
  }

  if (!trimmed || trimmed.length > 40 || isBulletLine(trimmed)) {
    return null;
  }

  const looksLikeHeading =
    /[:：]$/.test(trimmed) ||
    /^\*\*[^*]+\*\*$/.test(trimmed) ||
    (/[A-Z]/.test(trimmed) && trimmed === trimmed.toUpperCase());
  if (looksLikeHeading && identifySection(trimmed)) {
    return trimmed.replace(/\*\*/g, '').replace(/[:：]$/, '').trim();
  }

  // Chinese section titles usually stand alone on a line
  if (identifySection(trimmed) && CJK_PATTERN.test(trimmed)) {
    return trimmed;
  }

  return null;
}

export function splitSections(markdown: string): MarkdownSection[] {
  const sections: MarkdownSection[] = [];
  let current: MarkdownSection = { heading: null, id: null, lines: [] };

  for (const line of markdown.split('\n')) {
    const heading = headingText(line);
    if (heading !== null) {
      if (current.heading !== null || current.lines.some(l => l.trim())) {
        sections.push(current);
      }
      current = { heading, id: identifySection(heading), lines: [] };
    } else {
      current.lines.push(line);
    }
  }

  if (current.heading !== null || current.lines.some(l => l.trim())) {
    sections.push(current);
  }

  return sections;
}
