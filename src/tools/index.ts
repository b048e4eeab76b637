/**
 * Toolbox
 *
 * The three pipeline tools and their renderers.
 */

export * from './inputProcessor';
export * from './textModifier';
export * from './resumeGenerator';
export * from './latexRenderer';
export * from './latexCompiler';
export * from './docxRenderer';
export * from './magicResumeBuilder';
export * from './magicResumeDocx';
export * from './markdownSections';
