/**
 * Tests for the Magic Resume Word layout
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { MagicResumeBuilder, MagicResumeData } from '../../tools/magicResumeBuilder';
import {
  htmlToLines,
  layoutMagicResume,
  pxToPt,
  renderMagicResumeDocx,
  themeColorHex
} from '../../tools/magicResumeDocx';
import { loadDocxModule } from '../../tools/docxRenderer';
import { InputProcessor } from '../../tools/inputProcessor';
import { makeTempDir, removeDir } from '../helpers/fakes';

function sampleResume(): MagicResumeData {
  let counter = 0;
  return new MagicResumeBuilder('timeline', {
    idFactory: () => `id-${++counter}`,
    now: () => new Date('2024-03-01T12:00:00.000Z')
  })
    .setBasicInfo({ name: 'Jane Doe', title: 'Backend Engineer', email: 'jane@example.com', location: 'Berlin' })
    .addEducation({
      school: 'State University',
      degree: 'BSc',
      major: 'Computer Science',
      startDate: '2014-09-01',
      endDate: '2018-06-30',
      gpa: '3.8'
    })
    .addExperience({
      company: 'Acme',
      position: 'Engineer',
      date: '2019 - 2023',
      details: '- Built the billing platform\n- Led a team of **four**'
    })
    .addProject({ name: 'resume-agent', description: 'Command line resume builder' })
    .setSkills('- TypeScript, Go')
    .build();
}

describe('htmlToLines', () => {
  it('should keep list items and paragraphs in order', () => {
    const html = '<p>Summary &amp; scope</p>\n<ul class="custom-list">\n<li><p>Built <strong>APIs</strong></p></li>\n</ul>';

    expect(htmlToLines(html)).toEqual([
      { text: 'Summary & scope', bullet: false },
      { text: 'Built APIs', bullet: true }
    ]);
  });

  it('should split markup without block tags on its tags', () => {
    expect(htmlToLines('Go<br>Rust &lt;2021&gt;')).toEqual([
      { text: 'Go', bullet: false },
      { text: 'Rust <2021>', bullet: false }
    ]);
  });

  it('should return nothing for an empty field', () => {
    expect(htmlToLines('')).toEqual([]);
  });
});

describe('units', () => {
  it('should convert pixels to points', () => {
    expect(pxToPt(16)).toBeCloseTo(9.28);
  });

  it('should read six-digit theme colours and default to black', () => {
    expect(themeColorHex('#18181b')).toBe('18181B');
    expect(themeColorHex('red')).toBe('000000');
  });
});

describe('layoutMagicResume', () => {
  it('should lay out every enabled section in menu order', () => {
    expect(layoutMagicResume(sampleResume())).toEqual([
      { kind: 'name', text: 'Jane Doe' },
      { kind: 'title', text: 'Backend Engineer' },
      { kind: 'contact', text: 'jane@example.com  |  Berlin' },
      { kind: 'section', text: 'Education' },
      { kind: 'item', text: 'State University  |  BSc  |  Computer Science', date: '2014-09 - 2018-06' },
      { kind: 'note', text: 'GPA: 3.8' },
      { kind: 'section', text: 'Experience' },
      { kind: 'item', text: 'Acme  |  Engineer', date: '2019 - 2023' },
      { kind: 'bullet', text: 'Built the billing platform' },
      { kind: 'bullet', text: 'Led a team of four' },
      { kind: 'section', text: 'Projects' },
      { kind: 'item', text: 'resume-agent', date: '' },
      { kind: 'paragraph', text: 'Command line resume builder' },
      { kind: 'section', text: 'Skills' },
      { kind: 'bullet', text: 'TypeScript, Go' }
    ]);
  });

  it('should honour menu order, disabled sections and hidden entries', () => {
    const data = sampleResume();
    data.experience[0].visible = false;
    data.menuSections = data.menuSections.map(section => {
      if (section.id === 'skills') return { ...section, enabled: false };
      if (section.id === 'projects') return { ...section, order: -1 };
      return section;
    });

    const sections = layoutMagicResume(data)
      .filter(block => block.kind === 'section')
      .map(block => block.text);

    expect(sections).toEqual(['Projects', 'Education']);
  });
});

describe('renderMagicResumeDocx', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should write a Word document that reads back as the resume text', async () => {
    const buffer = await renderMagicResumeDocx(await loadDocxModule(), sampleResume());
    const file = path.join(dir, 'resume.docx');
    await fs.promises.writeFile(file, buffer);

    const result = await new InputProcessor().process({ path: file });
    const paragraphs = result.markdown.split('\n\n');

    expect(paragraphs[0]).toBe('Jane Doe');
    expect(paragraphs).toEqual(expect.arrayContaining([
      'Backend Engineer',
      'Education',
      'GPA: 3.8',
      'Built the billing platform',
      'Command line resume builder',
      'Skills',
      'TypeScript, Go'
    ]));
  });
});
