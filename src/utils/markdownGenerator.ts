import type { Presentation, Slide, SlideElement } from "../types.ts";

const TITLE_PLACEHOLDERS = new Set(['title', 'ctrTitle']);

export function findTitle(slide: Slide): string {
  for (const element of slide.elements) {
    if (element.elementType !== 'TextBox' && element.elementType !== 'AutoShape') continue;
    if (element.placeholder && TITLE_PLACEHOLDERS.has(element.placeholder.type) && element.fullText.trim()) {
      return element.fullText.trim().replace(/\n+/g, ' ');
    }
  }
  return 'Untitled Slide';
}

function elementText(element: SlideElement): string[] {
  switch (element.elementType) {
    case 'TextBox':
    case 'AutoShape':
      return element.fullText.trim() ? [element.fullText.trim()] : [];
    default:
      return [];
  }
}

function countBy<T>(items: T[], key: (item: T) => string | null): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    if (k === null) continue;
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

export function generateMarkdown(content: Presentation): string {
  const elements = content.slides.flatMap((slide) => slide.elements);
  const runs = elements.flatMap((element) => {
    if (element.elementType === 'TextBox' || element.elementType === 'AutoShape') {
      return element.paragraphs.flatMap((p) => p.runs);
    }
    if (element.elementType === 'Table') {
      return element.table.cells.flatMap((cell) => cell.paragraphs.flatMap((p) => p.runs));
    }
    return [];
  });
  const bullets = elements.flatMap((element) =>
    element.elementType === 'TextBox' || element.elementType === 'AutoShape'
      ? element.paragraphs.filter((p) => p.formatting.bullet && p.formatting.bullet.type !== 'none')
      : []
  );

  let markdown = `# Presentation Content\n\n`;
  markdown += `Source: ${content.name}\n\n`;
  markdown += `Slides: ${content.totalSlides}\n\n`;
  if (content.targetLanguage) {
    markdown += `Language: ${content.targetLanguage} (${content.targetLanguageTag ?? '?'})${content.isRightToLeft ? ', right-to-left' : ''}\n\n`;
  }

  markdown += `## Element Types\n\n`;
  for (const [type, count] of countBy(elements, (e) => e.elementType)) {
    markdown += `- ${type}: ${count}\n`;
  }
  markdown += '\n';

  const fonts = countBy(runs, (run) => run.fontName);
  if (fonts.size > 0) {
    markdown += `## Fonts\n\n`;
    for (const [font, count] of [...fonts].sort((a, b) => b[1] - a[1])) {
      markdown += `- ${font}: ${count} runs\n`;
    }
    markdown += '\n';
  }
  markdown += `Bulleted paragraphs: ${bullets.length}\n\n`;

  content.slides.forEach((slide) => {
    markdown += `## Slide ${slide.slideNumber}: ${findTitle(slide)}\n\n`;

    slide.elements.flatMap(elementText).forEach((text) => {
      markdown += `${text}\n\n`;
    });

    for (const element of slide.elements) {
      if (element.elementType === 'Table') {
        markdown += `### Table: ${element.shapeName}\n\n`;
        for (let r = 0; r < element.table.rows; r++) {
          const cells = element.table.cells.filter((cell) => cell.row === r).map((cell) => cell.text.replace(/\n/g, ' '));
          markdown += `| ${cells.join(' | ')} |\n`;
          if (r === 0) markdown += `|${cells.map(() => ' --- |').join('')}\n`;
        }
        markdown += '\n';
      } else if (element.elementType === 'Chart') {
        markdown += `### Chart: ${element.chart.title ?? element.shapeName}\n\n`;
        if (element.chart.seriesNames.length > 0) markdown += `- Series: ${element.chart.seriesNames.join(', ')}\n`;
        if (element.chart.categories.length > 0) markdown += `- Categories: ${element.chart.categories.join(', ')}\n`;
        markdown += '\n';
      }
    }

    if (slide.diagramNodes.length > 0) {
      markdown += `### Diagram\n\n`;
      slide.diagramNodes.forEach((node) => {
        markdown += `${'  '.repeat(node.level ?? 0)}- ${node.text}\n`;
      });
      markdown += '\n';
    }

    // Add notes if present
    if (slide.speakerNotes && slide.speakerNotes.text.trim()) {
      markdown += `### Notes\n\n`;
      slide.speakerNotes.paragraphs
        .filter((p) => p.text.trim())
        .forEach((p) => {
          markdown += `- ${p.text}\n`;
        });
      markdown += '\n';
    }
  });

  return markdown;
}
