/**
 * Maturity Classifier
 *
 * Decides whether the input is a free-form description, a complete resume
 * or a resume that still needs restructuring.
 */

import { ResumeMaturity } from '../types';
import { isBulletLine, splitSections, SectionId } from '../tools/markdownSections';

export const MATURE_MIN_SECTIONS = 3;
export const MATURE_MIN_BULLETS = 3;

export interface MaturityReport {
  maturity: ResumeMaturity;
  sections: SectionId[];
  bulletCount: number;
}

export function analyzeMaturity(markdown: string): MaturityReport {
  const sections: SectionId[] = [];
  for (const section of splitSections(markdown)) {
    if (section.id && !sections.includes(section.id)) {
      sections.push(section.id);
    }
  }
  const bulletCount = markdown.split('\n').filter(isBulletLine).length;

  let maturity: ResumeMaturity;
  if (sections.length === 0) {
    maturity = ResumeMaturity.RAW_TEXT;
  } else if (sections.length >= MATURE_MIN_SECTIONS && bulletCount >= MATURE_MIN_BULLETS) {
    maturity = ResumeMaturity.MATURE;
  } else {
    maturity = ResumeMaturity.IMMATURE;
  }

  return { maturity, sections, bulletCount };
}

export function classifyMaturity(markdown: string): ResumeMaturity {
  return analyzeMaturity(markdown).maturity;
}
