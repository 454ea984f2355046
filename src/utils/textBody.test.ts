import { describe, expect, it } from "vitest";
import {
  addRun,
  enableAutoFit,
  paragraphsOf,
  readParagraphs,
  replaceBodyText,
  runsOf,
  setParagraphRtl,
} from "./textBody.ts";
import { NS, childElements, firstChild, parseXMLContent } from "./xmlParser.ts";

function body(inner: string): Element {
  const doc = parseXMLContent(`<p:txBody xmlns:a="${NS.a}" xmlns:p="${NS.p}">${inner}</p:txBody>`);
  return doc.documentElement;
}

function firstParagraph(txBody: Element): Element {
  const [p] = paragraphsOf(txBody);
  if (!p) throw new Error('no paragraph');
  return p;
}

describe('readParagraphs', () => {
  it('reads run text and formatting', () => {
    const txBody = body(
      '<a:bodyPr/><a:p><a:pPr algn="ctr" lvl="1"><a:buChar char="•"/></a:pPr>' +
        '<a:r><a:rPr sz="2400" b="1"><a:solidFill><a:srgbClr val="FF0000"/></a:solidFill><a:latin typeface="Arial"/></a:rPr><a:t>Hello</a:t></a:r>' +
        '<a:r><a:rPr i="1"/><a:t> world</a:t></a:r></a:p>'
    );

    const [p] = readParagraphs(txBody);

    expect(p.text).toBe('Hello world');
    expect(p.formatting.alignment).toBe('ctr');
    expect(p.formatting.level).toBe(1);
    expect(p.formatting.bullet?.type).toBe('char');
    expect(p.formatting.bullet?.character).toBe('•');
    expect(p.runs[0]).toMatchObject({ fontSizePt: 24, bold: true, fontName: 'Arial' });
    expect(p.runs[0].color?.rgb).toBe('FF0000');
    expect(p.runs[1]).toMatchObject({ italic: true, bold: null });
  });

  it('returns no paragraphs for a missing body', () => {
    expect(readParagraphs(null)).toEqual([]);
  });
});

describe('addRun', () => {
  it('inserts before the end-of-paragraph properties with only bold, italic and size', () => {
    const txBody = body('<a:p><a:r><a:rPr b="1"/><a:t>A</a:t></a:r><a:endParaRPr lang="en-US"/></a:p>');
    const p = firstParagraph(txBody);

    addRun(p, 'B', { bold: false, italic: true, fontSizePt: 18 });

    const runs = runsOf(p);
    expect(runs).toHaveLength(2);
    expect(p.lastChild?.nodeName).toBe('a:endParaRPr');
    const rPr = firstChild(runs[1], NS.a, 'rPr');
    expect(rPr?.getAttribute('sz')).toBe('1800');
    expect(rPr?.getAttribute('b')).toBe('0');
    expect(rPr?.getAttribute('i')).toBe('1');
    expect(rPr?.getAttribute('dirty')).toBe('0');
    expect(firstChild(runs[1], NS.a, 't')?.textContent).toBe('B');
  });
});

describe('setParagraphRtl', () => {
  it('creates paragraph properties as the first child', () => {
    const txBody = body('<a:p><a:r><a:t>x</a:t></a:r></a:p>');
    const p = firstParagraph(txBody);

    setParagraphRtl(p);

    const pPr = p.firstChild;
    expect(pPr?.nodeName).toBe('a:pPr');
    expect(firstChild(p, NS.a, 'pPr')?.getAttribute('rtl')).toBe('1');
    expect(firstChild(p, NS.a, 'pPr')?.getAttribute('algn')).toBe('r');
  });
});

describe('enableAutoFit', () => {
  it('replaces other autofit modes and keeps schema order', () => {
    const txBody = body('<a:bodyPr wrap="none"><a:prstTxWarp prst="textNoShape"/><a:spAutoFit/></a:bodyPr><a:p/>');

    enableAutoFit(txBody);

    const bodyPr = firstChild(txBody, NS.a, 'bodyPr');
    expect(bodyPr?.getAttribute('wrap')).toBe('square');
    expect(childElements(bodyPr ?? txBody).map((el) => el.localName)).toEqual(['prstTxWarp', 'normAutofit']);
  });

  it('creates body properties when missing', () => {
    const txBody = body('<a:p/>');

    enableAutoFit(txBody);

    expect(txBody.firstChild?.nodeName).toBe('a:bodyPr');
    expect(childElements(txBody.firstChild ?? txBody).map((el) => el.localName)).toEqual(['normAutofit']);
  });
});

describe('replaceBodyText', () => {
  it('writes one paragraph per line keeping the first paragraph properties', () => {
    const txBody = body(
      '<a:bodyPr/><a:p><a:pPr algn="ctr"/><a:r><a:t>Old</a:t></a:r><a:r><a:t>x</a:t></a:r></a:p>' +
        '<a:p><a:r><a:t>gone</a:t></a:r></a:p>'
    );

    replaceBodyText(txBody, 'One\nTwo');

    const paragraphs = readParagraphs(txBody);
    expect(paragraphs.map((p) => p.text)).toEqual(['One', 'Two']);
    expect(paragraphs.map((p) => p.formatting.alignment)).toEqual(['ctr', 'ctr']);
  });

  it('leaves a body that already holds the text alone', () => {
    const txBody = body(
      '<a:bodyPr/><a:p><a:r><a:rPr b="1"/><a:t>Sales </a:t></a:r><a:r><a:rPr i="1"/><a:t>2024</a:t></a:r></a:p>'
    );

    replaceBodyText(txBody, 'Sales 2024');

    const [p] = readParagraphs(txBody);
    expect(p.runs.map((r) => [r.text, r.bold, r.italic])).toEqual([
      ['Sales ', true, null],
      ['2024', null, true],
    ]);
  });
});
