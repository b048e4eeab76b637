/**
 * Magic Resume Builder
 *
 * Builds the JSON document understood by the Magic Resume editor from
 * resume Markdown. Free-text fields are stored as HTML.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { loggers } from '../shared/logger';
import { isBulletLine, splitSections, stripBullet, SectionId } from './markdownSections';

// ============================================================================
// Templates and defaults
// ============================================================================

export type MagicTemplateId = 'classic' | 'modern' | 'left-right' | 'timeline';

export interface MagicTemplate {
  name: string;
  description: string;
  layout: MagicTemplateId;
  colorScheme: { primary: string; secondary: string; background: string; text: string };
  spacing: { sectionGap: number; itemGap: number; contentPadding: number };
  basic: { layout: 'center' | 'left' | 'right' };
}

export const MAGIC_TEMPLATES: Record<MagicTemplateId, MagicTemplate> = {
  classic: {
    name: 'Classic',
    description: 'Traditional single-column layout that suits most applications',
    layout: 'classic',
    colorScheme: { primary: '#000000', secondary: '#4b5563', background: '#ffffff', text: '#212529' },
    spacing: { sectionGap: 24, itemGap: 16, contentPadding: 32 },
    basic: { layout: 'center' }
  },
  modern: {
    name: 'Two columns',
    description: 'Two-column layout that puts the person first',
    layout: 'modern',
    colorScheme: { primary: '#000000', secondary: '#6b7280', background: '#ffffff', text: '#212529' },
    spacing: { sectionGap: 20, itemGap: 20, contentPadding: 1 },
    basic: { layout: 'center' }
  },
  'left-right': {
    name: 'Shaded section titles',
    description: 'Section titles on a coloured band',
    layout: 'left-right',
    colorScheme: { primary: '#000000', secondary: '#9ca3af', background: '#ffffff', text: '#212529' },
    spacing: { sectionGap: 24, itemGap: 16, contentPadding: 32 },
    basic: { layout: 'left' }
  },
  timeline: {
    name: 'Timeline',
    description: 'Timeline layout that follows the order of events',
    layout: 'timeline',
    colorScheme: { primary: '#18181b', secondary: '#64748b', background: '#ffffff', text: '#212529' },
    spacing: { sectionGap: 1, itemGap: 12, contentPadding: 24 },
    basic: { layout: 'right' }
  }
};

export interface GlobalSettings {
  baseFontSize: number;
  pagePadding: number;
  paragraphSpacing: number;
  lineHeight: number;
  sectionSpacing: number;
  headerSize: number;
  subheaderSize: number;
  useIconMode: boolean;
  themeColor: string;
  centerSubtitle: boolean;
}

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  baseFontSize: 16,
  pagePadding: 32,
  paragraphSpacing: 12,
  lineHeight: 1.3,
  sectionSpacing: 10,
  headerSize: 18,
  subheaderSize: 16,
  useIconMode: true,
  themeColor: '#000000',
  centerSubtitle: true
};

export interface MenuSection {
  id: string;
  title: string;
  icon: string;
  enabled: boolean;
  order: number;
}

export const DEFAULT_MENU_SECTIONS: MenuSection[] = [
  { id: 'basic', title: 'Basic Info', icon: '👤', enabled: true, order: 0 },
  { id: 'education', title: 'Education', icon: '🎓', enabled: true, order: 1 },
  { id: 'experience', title: 'Experience', icon: '💼', enabled: true, order: 2 },
  { id: 'projects', title: 'Projects', icon: '🚀', enabled: true, order: 3 },
  { id: 'skills', title: 'Skills', icon: '⚡', enabled: true, order: 4 }
];

// ============================================================================
// Document types
// ============================================================================

export interface BasicField {
  id: string;
  key: 'name' | 'title' | 'email' | 'phone' | 'location';
  label: string;
  type: 'text';
  visible: boolean;
}

export interface BasicInfo {
  name: string;
  title: string;
  email: string;
  phone: string;
  location: string;
  fieldOrder: BasicField[];
  icons: Record<string, string>;
  photoConfig: {
    width: number;
    height: number;
    aspectRatio: string;
    borderRadius: string;
    visible: boolean;
  };
  customFields: Array<{ id: string; label: string; value: string }>;
}

export interface EducationEntry {
  id: string;
  school: string;
  major: string;
  degree: string;
  startDate: string;
  endDate: string;
  gpa: string;
  description: string;
  visible: boolean;
}

export interface ExperienceEntry {
  id: string;
  company: string;
  position: string;
  date: string;
  details: string;
  visible: boolean;
}

export interface ProjectEntry {
  id: string;
  name: string;
  role: string;
  date: string;
  description: string;
  link: string;
  visible: boolean;
}

export interface MagicResumeData {
  title: string;
  id: string;
  createdAt: string;
  updatedAt: string;
  templateId: MagicTemplateId;
  basic: Partial<BasicInfo>;
  education: EducationEntry[];
  experience: ExperienceEntry[];
  projects: ProjectEntry[];
  skillContent: string;
  menuSections: MenuSection[];
  globalSettings: GlobalSettings;
  customData: Record<string, unknown>;
}

// ============================================================================
// Markdown → HTML
// ============================================================================

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function convertInlineMarkdown(text: string): string {
  return escapeHtml(text)
    .replace(/\*\*(.+?)\*\*/g, '<strong>$1</strong>')
    .replace(/__(.+?)__/g, '<strong>$1</strong>')
    .replace(/\*(.+?)\*/g, '<em>$1</em>')
    .replace(/(^|[^\w])_(.+?)_(?=[^\w]|$)/g, '$1<em>$2</em>')
    .replace(/`(.+?)`/g, '<code>$1</code>');
}

/**
 * Converts resume Markdown (paragraphs and "- " bullets) into the HTML the
 * editor stores in free-text fields
 */
export function markdownToHtml(markdown: string): string {
  const parts: string[] = [];
  let inList = false;

  for (const raw of markdown.split('\n')) {
    const line = raw.trim();
    if (!line) {
      if (inList) {
        parts.push('</ul>');
        inList = false;
      }
      continue;
    }

    if (line.startsWith('- ') || line.startsWith('* ')) {
      if (!inList) {
        parts.push('<ul class="custom-list">');
        inList = true;
      }
      parts.push(`<li><p>${convertInlineMarkdown(line.slice(2).trim())}</p></li>`);
    } else {
      if (inList) {
        parts.push('</ul>');
        inList = false;
      }
      parts.push(`<p>${convertInlineMarkdown(line)}</p>`);
    }
  }

  if (inList) {
    parts.push('</ul>');
  }

  return parts.join('\n');
}

// ============================================================================
// Builder
// ============================================================================

export interface MagicResumeBuilderOptions {
  idFactory?: () => string;
  now?: () => Date;
  logger?: Logger;
}

function isTemplateId(value: string): value is MagicTemplateId {
  return Object.prototype.hasOwnProperty.call(MAGIC_TEMPLATES, value);
}

export class MagicResumeBuilder {
  private readonly templateId: MagicTemplateId;
  private readonly newId: () => string;
  private readonly now: () => Date;
  private readonly data: MagicResumeData;

  constructor(templateId: string = 'classic', options: MagicResumeBuilderOptions = {}) {
    const log = options.logger ?? loggers.generator;
    if (!isTemplateId(templateId)) {
      log.warn({ templateId }, `Unknown template '${templateId}', using 'classic'`);
    }
    this.templateId = isTemplateId(templateId) ? templateId : 'classic';
    this.newId = options.idFactory ?? randomUUID;
    this.now = options.now ?? (() => new Date());

    const id = this.newId();
    const timestamp = this.now().toISOString();
    this.data = {
      title: `Resume_${id.slice(0, 8)}`,
      id,
      createdAt: timestamp,
      updatedAt: timestamp,
      templateId: this.templateId,
      basic: {},
      education: [],
      experience: [],
      projects: [],
      skillContent: '',
      menuSections: DEFAULT_MENU_SECTIONS.map(section => ({ ...section })),
      globalSettings: {
        ...DEFAULT_GLOBAL_SETTINGS,
        themeColor: MAGIC_TEMPLATES[this.templateId].colorScheme.primary
      },
      customData: {}
    };
  }

  static listTemplates(): Record<MagicTemplateId, string> {
    return {
      classic: MAGIC_TEMPLATES.classic.name,
      modern: MAGIC_TEMPLATES.modern.name,
      'left-right': MAGIC_TEMPLATES['left-right'].name,
      timeline: MAGIC_TEMPLATES.timeline.name
    };
  }

  setBasicInfo(info: { name?: string; title?: string; email?: string; phone?: string; location?: string }): this {
    const name = info.name ?? '';
    const title = info.title ?? '';
    const email = info.email ?? '';
    const phone = info.phone ?? '';
    const location = info.location ?? '';

    this.data.basic = {
      name,
      title,
      email,
      phone,
      location,
      fieldOrder: [
        { id: '1', key: 'name', label: 'Name', type: 'text', visible: true },
        { id: '2', key: 'title', label: 'Title', type: 'text', visible: Boolean(title) },
        { id: '5', key: 'email', label: 'Email', type: 'text', visible: Boolean(email) },
        { id: '6', key: 'phone', label: 'Phone', type: 'text', visible: Boolean(phone) },
        { id: '7', key: 'location', label: 'Location', type: 'text', visible: Boolean(location) }
      ],
      icons: { email: 'Mail', phone: 'Phone', location: 'MapPin' },
      photoConfig: {
        width: 90,
        height: 120,
        aspectRatio: '1:1',
        borderRadius: 'none',
        visible: false
      },
      customFields: []
    };
    return this;
  }

  addEducation(entry: {
    school: string;
    major?: string;
    degree?: string;
    startDate?: string;
    endDate?: string;
    gpa?: string;
    description?: string;
  }): this {
    this.data.education.push({
      id: this.newId(),
      school: entry.school,
      major: entry.major ?? '',
      degree: entry.degree ?? '',
      startDate: entry.startDate ?? '',
      endDate: entry.endDate ?? '',
      gpa: entry.gpa ?? '',
      description: entry.description ? markdownToHtml(entry.description) : '',
      visible: true
    });
    return this;
  }

  addExperience(entry: { company: string; position?: string; date?: string; details?: string }): this {
    this.data.experience.push({
      id: this.newId(),
      company: entry.company,
      position: entry.position ?? '',
      date: entry.date ?? '',
      details: entry.details ? markdownToHtml(entry.details) : '',
      visible: true
    });
    return this;
  }

  addProject(entry: { name: string; role?: string; date?: string; description?: string; link?: string }): this {
    this.data.projects.push({
      id: this.newId(),
      name: entry.name,
      role: entry.role ?? '',
      date: entry.date ?? '',
      description: entry.description ? markdownToHtml(entry.description) : '',
      link: entry.link ?? '',
      visible: true
    });
    return this;
  }

  setSkills(skillContent: string): this {
    this.data.skillContent = markdownToHtml(skillContent);
    return this;
  }

  setGlobalSettings(settings: Partial<GlobalSettings>): this {
    this.data.globalSettings = { ...this.data.globalSettings, ...settings };
    return this;
  }

  build(): MagicResumeData {
    this.data.updatedAt = this.now().toISOString();
    return structuredClone(this.data);
  }

  /**
   * Fills the builder from resume Markdown. Sub-headings inside the
   * experience, education and projects sections become entries; the
   * heading text is split on "|" into its fields.
   */
  fromMarkdown(markdown: string, candidateName?: string): this {
    const basic: { name?: string; title?: string; email?: string; phone?: string; location?: string } = {
      name: candidateName
    };
    const extraContent: string[] = [];
    let skills = '';
    let current: SectionId | null = null;

    for (const section of splitSections(markdown)) {
      const body = section.lines.join('\n').trim();

      if (section.id) {
        current = section.id;
        if (section.id === 'skills') {
          skills = appendBlock(skills, body);
        } else if (section.id === 'contact') {
          collectContact(body, basic);
        } else if (body && isEntrySection(section.id)) {
          this.addEntry(section.id, '', body);
        } else if (body) {
          extraContent.push(`**${section.heading ?? ''}**\n${body}`);
        }
        continue;
      }

      if (current && isEntrySection(current) && section.heading) {
        this.addEntry(current, section.heading, body);
        continue;
      }

      if (current === null) {
        // content before the first known section: name, title and contact lines
        if (section.heading && !basic.name) {
          basic.name = section.heading;
        }
        const firstLine = section.lines.map(l => l.trim()).find(l => l && !isBulletLine(l));
        if (firstLine && !basic.title && !EMAIL_PATTERN.test(firstLine)) {
          basic.title = firstLine;
        }
        collectContact(body, basic);
        continue;
      }

      const heading = section.heading ? `**${section.heading}**\n` : '';
      extraContent.push(`${heading}${body}`.trim());
    }

    this.setBasicInfo(basic);
    this.setSkills([skills, ...extraContent].filter(Boolean).join('\n\n'));
    return this;
  }

  private addEntry(section: EntrySectionId, heading: string, body: string): void {
    const parts = heading ? heading.split(/\s*[|｜]\s*/).map(p => p.trim()) : [];
    const field = (i: number) => parts[i] ?? '';

    switch (section) {
      case 'experience':
        this.addExperience({
          company: field(0),
          position: field(1),
          date: field(2),
          details: body
        });
        break;
      case 'education': {
        const [startDate, endDate] = splitDateRange(field(2));
        this.addEducation({
          school: field(0),
          degree: field(1),
          startDate,
          endDate,
          description: body
        });
        break;
      }
      case 'projects':
        this.addProject({
          name: field(0),
          role: field(1),
          date: field(2),
          description: body
        });
        break;
    }
  }
}

type EntrySectionId = Extract<SectionId, 'experience' | 'education' | 'projects'>;

function isEntrySection(id: SectionId): id is EntrySectionId {
  return id === 'experience' || id === 'education' || id === 'projects';
}

const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
const PHONE_PATTERN = /\+?\d[\d\s()-]{6,}\d/;

function collectContact(
  text: string,
  basic: { email?: string; phone?: string; location?: string }
): void {
  const email = text.match(EMAIL_PATTERN);
  if (email && !basic.email) {
    basic.email = email[0];
  }
  const phone = text.replace(EMAIL_PATTERN, '').match(PHONE_PATTERN);
  if (phone && !basic.phone) {
    basic.phone = phone[0].trim();
  }
  for (const line of text.split('\n')) {
    const location = stripBullet(line).match(/^(?:location|address|所在地|地址)\s*[:：]\s*(.+)$/i);
    if (location && !basic.location) {
      basic.location = location[1].trim();
    }
  }
}

function splitDateRange(value: string): [string, string] {
  const [start = '', end = ''] = value.split(/\s*(?:–|—|~|至|\s-\s|-(?=\s*(?:present|now|至今|\d)))\s*/i);
  return [start.trim(), end.trim()];
}

function appendBlock(existing: string, block: string): string {
  if (!block) return existing;
  return existing ? `${existing}\n\n${block}` : block;
}
