import type { ChartData, DataLabel } from "../types.ts";
import { bodyText, replaceBodyText } from "./textBody.ts";
import { NS, childElements, childPath, descendants, firstChild, intAttr, textOf } from "./xmlParser.ts";

type AxisKind = 'category' | 'value' | 'series';

const AXIS_ELEMENTS: Record<AxisKind, string[]> = {
  category: ['catAx', 'dateAx'],
  value: ['valAx'],
  series: ['serAx'],
};

export function chartRoot(doc: Document): Element | null {
  return childPath(doc, [[NS.c, 'chartSpace'], [NS.c, 'chart']]);
}

function plotArea(chart: Element): Element | null {
  return firstChild(chart, NS.c, 'plotArea');
}

function plots(chart: Element): Element[] {
  const area = plotArea(chart);
  if (!area) return [];
  return childElements(area).filter((el) => el.namespaceURI === NS.c && el.localName.endsWith('Chart'));
}

export function seriesElements(chart: Element): Element[] {
  return plots(chart).flatMap((plot) => childElements(plot, NS.c, 'ser'));
}

function richText(title: Element | null): Element | null {
  return childPath(title, [[NS.c, 'tx'], [NS.c, 'rich']]);
}

/** Text of a `c:title` or `c:tx` holder: rich text, a string reference cache, or a literal value. */
function holderText(holder: Element | null): string | null {
  if (!holder) return null;
  const rich = richText(holder) ?? firstChild(holder, NS.c, 'rich');
  if (rich) {
    return bodyText(rich);
  }
  const tx = holder.localName === 'tx' ? holder : firstChild(holder, NS.c, 'tx');
  const cached = childPath(tx, [[NS.c, 'strRef'], [NS.c, 'strCache'], [NS.c, 'pt'], [NS.c, 'v']]);
  if (cached) return textOf(cached);
  const literal = firstChild(tx, NS.c, 'v');
  return literal ? textOf(literal) : null;
}

function cachePoints(container: Element | null): Array<{ idx: number; value: string }> {
  if (!container) return [];
  return descendants(container, NS.c, 'pt').map((pt) => ({
    idx: intAttr(pt, 'idx') ?? 0,
    value: textOf(firstChild(pt, NS.c, 'v')),
  }));
}

export function chartTitleElement(chart: Element): Element | null {
  const deleted = firstChild(chart, NS.c, 'autoTitleDeleted');
  const title = firstChild(chart, NS.c, 'title');
  if (!title || deleted?.getAttribute('val') === '1') return null;
  return title;
}

export function axisTitleElement(chart: Element, kind: AxisKind): Element | null {
  const area = plotArea(chart);
  if (!area) return null;
  for (const name of AXIS_ELEMENTS[kind]) {
    const axis = firstChild(area, NS.c, name);
    const title = firstChild(axis, NS.c, 'title');
    if (title) return title;
  }
  return null;
}

export function dataLabelElements(chart: Element): Array<{ seriesIndex: number; pointIndex: number; label: Element }> {
  return seriesElements(chart).flatMap((ser, seriesIndex) =>
    childElements(firstChild(ser, NS.c, 'dLbls') ?? ser, NS.c, 'dLbl')
      .filter((label) => richText(label) !== null)
      .map((label) => ({ seriesIndex, pointIndex: intAttr(firstChild(label, NS.c, 'idx'), 'val') ?? 0, label }))
  );
}

export function readChart(doc: Document, partName: string): ChartData {
  const chart = chartRoot(doc);
  if (!chart) throw new Error(`${partName} has no c:chart element`);

  const series = seriesElements(chart);
  const [firstSeries] = series;
  const categories = cachePoints(firstChild(firstSeries ?? null, NS.c, 'cat'))
    .sort((a, b) => a.idx - b.idx)
    .map((pt) => pt.value);

  const values = series.map((ser) => {
    const points = cachePoints(firstChild(ser, NS.c, 'val') ?? firstChild(ser, NS.c, 'yVal'));
    const out: Array<number | null> = [];
    for (const pt of points) {
      const n = Number(pt.value);
      out[pt.idx] = pt.value.trim() === '' || Number.isNaN(n) ? null : n;
    }
    return Array.from(out, (v) => v ?? null);
  });

  const dataLabels: DataLabel[] = dataLabelElements(chart).map(({ seriesIndex, pointIndex, label }) => ({
    seriesIndex,
    pointIndex,
    text: holderText(label) ?? '',
  }));

  return {
    partName,
    chartType: plots(chart)[0]?.localName ?? null,
    title: holderText(chartTitleElement(chart)),
    seriesNames: series.map((ser) => holderText(firstChild(ser, NS.c, 'tx')) ?? ''),
    categories,
    axisTitles: {
      category: holderText(axisTitleElement(chart, 'category')),
      value: holderText(axisTitleElement(chart, 'value')),
      series: holderText(axisTitleElement(chart, 'series')),
    },
    dataLabels,
    values,
  };
}

/** Rewrites the text of a title-like holder. Returns the rich-text body when there is one. */
export function writeHolderText(holder: Element, text: string): Element | null {
  const rich = richText(holder) ?? firstChild(holder, NS.c, 'rich');
  if (rich) {
    replaceBodyText(rich, text);
    return rich;
  }
  const tx = holder.localName === 'tx' ? holder : firstChild(holder, NS.c, 'tx');
  const cached = childPath(tx, [[NS.c, 'strRef'], [NS.c, 'strCache'], [NS.c, 'pt'], [NS.c, 'v']]);
  if (cached) {
    cached.textContent = text;
    return null;
  }
  const literal = firstChild(tx, NS.c, 'v');
  if (literal) {
    literal.textContent = text;
    return null;
  }
  throw new Error('title has no writable text');
}
