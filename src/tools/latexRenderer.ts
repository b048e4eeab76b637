/**
 * LaTeX Renderer
 *
 * Renders resume Markdown into a standalone LaTeX article. Output depends
 * only on the input, so rendering the same Markdown twice is byte-identical.
 */

import { CJK_PATTERN } from './markdownSections';

const LATEX_ESCAPES: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '&': '\\&',
  '%': '\\%',
  '$': '\\$',
  '#': '\\#',
  '_': '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}'
};

export function escapeLatex(text: string): string {
  return text.replace(/[\\&%$#_{}~^]/g, ch => LATEX_ESCAPES[ch] ?? ch);
}

/**
 * Escapes text and turns **bold** spans into \textbf{...}
 */
export function formatInlineLatex(text: string): string {
  let result = '';
  let last = 0;
  for (const match of text.matchAll(/\*\*(.+?)\*\*/g)) {
    const index = match.index ?? 0;
    result += escapeLatex(text.slice(last, index));
    result += `\\textbf{${escapeLatex(match[1])}}`;
    last = index + match[0].length;
  }
  return result + escapeLatex(text.slice(last));
}

const HEADING = /^#{1,6}\s+(.*)$/;

function bulletContent(line: string): string | null {
  if (/^[-•]/.test(line) || /^\*\s/.test(line)) {
    return line.slice(1).trim();
  }
  return null;
}

export function renderLatexBody(markdown: string): string {
  const out: string[] = [];
  let inList = false;

  const closeList = () => {
    if (inList) {
      out.push('\\end{itemize}');
      inList = false;
    }
  };

  for (const raw of markdown.split('\n')) {
    const line = raw.trim();
    const heading = line.match(HEADING);
    const bullet = heading ? null : bulletContent(line);

    if (heading) {
      closeList();
      out.push(`\\section*{${formatInlineLatex(heading[1].trim())}}`);
    } else if (bullet !== null) {
      if (!bullet) continue;
      if (!inList) {
        out.push('\\begin{itemize}');
        inList = true;
      }
      // {} stops a leading [ being read as the item label
      out.push(`\\item{} ${formatInlineLatex(bullet)}`);
    } else if (!line) {
      closeList();
    } else {
      closeList();
      // \relax stops a [ or * on the next line being read as an argument of \\
      out.push(`${formatInlineLatex(line)}\\\\\\relax`);
    }
  }
  closeList();

  return out.join('\n');
}

export interface LatexDocumentOptions {
  markdown: string;
  candidateName?: string;
}

export function renderLatex(options: LatexDocumentOptions): string {
  const name = options.candidateName?.trim();
  const cjk = CJK_PATTERN.test(options.markdown) || (name ? CJK_PATTERN.test(name) : false);

  const lines: string[] = [
    '\\documentclass[11pt]{article}',
    '\\usepackage[T1]{fontenc}',
    '\\usepackage[utf8]{inputenc}',
    '\\usepackage[margin=1in]{geometry}',
    '\\usepackage{hyperref}',
    '\\usepackage{titlesec}',
    '\\usepackage{enumitem}'
  ];
  if (cjk) {
    lines.push('\\usepackage{CJKutf8}');
  }
  lines.push(
    '\\titleformat{\\section}{\\large\\bfseries}{}{0em}{}',
    '\\setlist[itemize]{noitemsep, topsep=0pt}',
    '\\pagestyle{empty}',
    '\\begin{document}'
  );
  if (cjk) {
    lines.push('\\begin{CJK}{UTF8}{gbsn}');
  }
  if (name) {
    lines.push(
      '\\begin{center}',
      `{\\LARGE ${escapeLatex(name)}}`,
      '\\end{center}',
      '\\vspace{0.5em}'
    );
  }

  const body = renderLatexBody(options.markdown);
  if (body) {
    lines.push(body);
  }

  if (cjk) {
    lines.push('\\end{CJK}');
  }
  lines.push('\\end{document}');

  return lines.join('\n') + '\n';
}
