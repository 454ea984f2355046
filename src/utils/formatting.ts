import type {
  BulletFormat,
  ColorSpec,
  Dimensions,
  FillInfo,
  LineInfo,
  ParagraphFormatting,
  ShadowInfo,
  Spacing,
  TextFrameProperties,
  TextRun,
} from "../types.ts";
import {
  NS,
  boolAttr,
  childElements,
  firstChild,
  intAttr,
  relId,
  strAttr,
  textOf,
} from "./xmlParser.ts";

export type FormatCategory = 'fill' | 'line' | 'shadow' | 'dimensions';

/** Runs a reader and degrades to null when the underlying markup is unreadable. */
export function tryRead<T>(read: () => T | null): T | null {
  try {
    return read();
  } catch {
    return null;
  }
}

/** Shape properties element (`p:spPr` or `p:grpSpPr`) of a shape, if it has one. */
export function shapeProperties(shape: Element): Element | null {
  return firstChild(shape, NS.p, 'spPr') ?? firstChild(shape, NS.p, 'grpSpPr');
}

export function shapeTransform(shape: Element): Element | null {
  if (shape.localName === 'graphicFrame') return firstChild(shape, NS.p, 'xfrm');
  return firstChild(shapeProperties(shape), NS.a, 'xfrm');
}

/**
 * Whether a shape can carry a category of formatting at all. Graphic frames
 * have no shape properties, so fill, line and shadow do not apply to them.
 */
export function supportsFormat(shape: Element, category: FormatCategory): boolean {
  switch (category) {
    case 'fill':
    case 'line':
    case 'shadow':
      return shape.localName !== 'graphicFrame' && shapeProperties(shape) !== null;
    case 'dimensions':
      return shapeTransform(shape) !== null;
  }
}

const COLOR_ELEMENTS = ['srgbClr', 'schemeClr', 'sysClr', 'prstClr', 'scrgbClr', 'hslClr'];

export function readColor(container: Element | null): ColorSpec | null {
  if (!container) return null;
  const colorEl = childElements(container).find(
    (el) => el.namespaceURI === NS.a && COLOR_ELEMENTS.includes(el.localName ?? '')
  );
  if (!colorEl) return null;

  const color: ColorSpec = { rgb: null, themeColor: null, brightness: null };
  switch (colorEl.localName) {
    case 'srgbClr':
      color.rgb = strAttr(colorEl, 'val');
      break;
    case 'sysClr':
      color.rgb = strAttr(colorEl, 'lastClr');
      break;
    case 'schemeClr':
      color.themeColor = strAttr(colorEl, 'val');
      break;
    case 'prstClr':
      color.themeColor = strAttr(colorEl, 'val');
      break;
  }

  const lumMod = intAttr(firstChild(colorEl, NS.a, 'lumMod'), 'val');
  const lumOff = intAttr(firstChild(colorEl, NS.a, 'lumOff'), 'val');
  if (lumOff !== null) {
    color.brightness = lumOff / 100000;
  } else if (lumMod !== null) {
    color.brightness = lumMod / 100000 - 1;
  }
  return color;
}

export function readFill(spPr: Element | null): FillInfo | null {
  if (!spPr) return null;
  const base: FillInfo = { type: 'none', color: null, gradientStops: [], pattern: null };

  for (const el of childElements(spPr)) {
    if (el.namespaceURI !== NS.a) continue;
    switch (el.localName) {
      case 'noFill':
        return base;
      case 'solidFill':
        return { ...base, type: 'solid', color: readColor(el) };
      case 'gradFill': {
        const stops = childElements(firstChild(el, NS.a, 'gsLst') ?? el, NS.a, 'gs').map((gs) => ({
          position: (intAttr(gs, 'pos') ?? 0) / 100000,
          color: readColor(gs),
        }));
        return { ...base, type: 'gradient', gradientStops: stops };
      }
      case 'pattFill':
        return {
          ...base,
          type: 'pattern',
          pattern: strAttr(el, 'prst'),
          color: readColor(firstChild(el, NS.a, 'fgClr')),
        };
      case 'blipFill':
        return { ...base, type: 'picture' };
      case 'grpFill':
        return { ...base, type: 'group' };
    }
  }
  return null;
}

export function readLine(spPr: Element | null): LineInfo | null {
  const ln = firstChild(spPr, NS.a, 'ln');
  if (!ln) return null;
  return {
    widthEmu: intAttr(ln, 'w'),
    dashStyle: strAttr(firstChild(ln, NS.a, 'prstDash'), 'val'),
    color: readColor(firstChild(ln, NS.a, 'solidFill')),
    hasLine: firstChild(ln, NS.a, 'noFill') === null,
  };
}

export function readShadow(spPr: Element | null): ShadowInfo | null {
  const effects = firstChild(spPr, NS.a, 'effectLst');
  if (!effects) return null;
  const shadow =
    firstChild(effects, NS.a, 'outerShdw') ??
    firstChild(effects, NS.a, 'innerShdw') ??
    firstChild(effects, NS.a, 'prstShdw');
  if (!shadow) return null;
  return {
    kind: shadow.localName ?? 'shadow',
    blurRadius: intAttr(shadow, 'blurRad'),
    distance: intAttr(shadow, 'dist'),
    direction: intAttr(shadow, 'dir'),
    color: readColor(shadow),
  };
}

export function readDimensions(xfrm: Element | null): Dimensions | null {
  const off = firstChild(xfrm, NS.a, 'off');
  const ext = firstChild(xfrm, NS.a, 'ext');
  if (!off || !ext) return null;
  return {
    left: intAttr(off, 'x') ?? 0,
    top: intAttr(off, 'y') ?? 0,
    width: intAttr(ext, 'cx') ?? 0,
    height: intAttr(ext, 'cy') ?? 0,
    rotation: intAttr(xfrm, 'rot'),
  };
}

function readSpacing(container: Element | null): Spacing | null {
  if (!container) return null;
  const pct = intAttr(firstChild(container, NS.a, 'spcPct'), 'val');
  if (pct !== null) return { value: pct / 100000, unit: 'lines' };
  const pts = intAttr(firstChild(container, NS.a, 'spcPts'), 'val');
  if (pts !== null) return { value: pts / 100, unit: 'pt' };
  return null;
}

export function readBullet(pPr: Element | null): BulletFormat | null {
  if (!pPr) return null;
  const font = strAttr(firstChild(pPr, NS.a, 'buFont'), 'typeface');
  const color = readColor(firstChild(pPr, NS.a, 'buClr'));
  const sizePct = intAttr(firstChild(pPr, NS.a, 'buSzPct'), 'val');
  const base: BulletFormat = {
    type: 'none',
    character: null,
    numberingScheme: null,
    startAt: null,
    font,
    color,
    sizePercent: sizePct === null ? null : sizePct / 1000,
  };

  const buChar = firstChild(pPr, NS.a, 'buChar');
  if (buChar) return { ...base, type: 'char', character: strAttr(buChar, 'char') };
  const autoNum = firstChild(pPr, NS.a, 'buAutoNum');
  if (autoNum) {
    return { ...base, type: 'autoNumber', numberingScheme: strAttr(autoNum, 'type'), startAt: intAttr(autoNum, 'startAt') };
  }
  if (firstChild(pPr, NS.a, 'buBlip')) return { ...base, type: 'picture' };
  if (firstChild(pPr, NS.a, 'buNone')) return base;
  return null;
}

export function readParagraphFormatting(p: Element): ParagraphFormatting {
  const pPr = firstChild(p, NS.a, 'pPr');
  const rtl = boolAttr(pPr, 'rtl');
  return {
    alignment: strAttr(pPr, 'algn'),
    level: intAttr(pPr, 'lvl') ?? 0,
    lineSpacing: tryRead(() => readSpacing(firstChild(pPr, NS.a, 'lnSpc'))),
    spaceBefore: tryRead(() => readSpacing(firstChild(pPr, NS.a, 'spcBef'))),
    spaceAfter: tryRead(() => readSpacing(firstChild(pPr, NS.a, 'spcAft'))),
    indent: intAttr(pPr, 'indent'),
    leftIndent: intAttr(pPr, 'marL'),
    rightIndent: intAttr(pPr, 'marR'),
    bullet: tryRead(() => readBullet(pPr)),
    textDirection: rtl === null ? null : rtl ? 'rtl' : 'ltr',
  };
}

export type LinkResolver = (relationshipId: string) => string | null;

export function readRun(r: Element, resolveLink: LinkResolver = () => null): TextRun {
  const rPr = firstChild(r, NS.a, 'rPr');
  const sz = intAttr(rPr, 'sz');
  const baseline = intAttr(rPr, 'baseline');
  const ln = firstChild(rPr, NS.a, 'ln');
  const linkId = relId(firstChild(rPr, NS.a, 'hlinkClick'));

  return {
    text: textOf(firstChild(r, NS.a, 't')),
    fontName: strAttr(firstChild(rPr, NS.a, 'latin'), 'typeface'),
    fontSizePt: sz === null ? null : sz / 100,
    bold: boolAttr(rPr, 'b'),
    italic: boolAttr(rPr, 'i'),
    underline: strAttr(rPr, 'u'),
    color: tryRead(() => readColor(firstChild(rPr, NS.a, 'solidFill'))),
    strike: strAttr(rPr, 'strike'),
    kerning: intAttr(rPr, 'kern'),
    spacing: intAttr(rPr, 'spc'),
    caps: strAttr(rPr, 'cap'),
    superscript: baseline !== null && baseline > 0 ? baseline / 1000 : null,
    subscript: baseline !== null && baseline < 0 ? -baseline / 1000 : null,
    highlight: tryRead(() => readColor(firstChild(rPr, NS.a, 'highlight'))),
    outline: ln
      ? tryRead(() => ({ widthEmu: intAttr(ln, 'w'), color: readColor(firstChild(ln, NS.a, 'solidFill')) }))
      : null,
    hyperlink: linkId ? tryRead(() => resolveLink(linkId)) : null,
  };
}

export function readTextFrame(bodyPr: Element | null): TextFrameProperties | null {
  if (!bodyPr) return null;
  let autoSize: TextFrameProperties['autoSize'] = null;
  if (firstChild(bodyPr, NS.a, 'normAutofit')) autoSize = 'normal';
  else if (firstChild(bodyPr, NS.a, 'spAutoFit')) autoSize = 'shape';
  else if (firstChild(bodyPr, NS.a, 'noAutofit')) autoSize = 'none';

  return {
    wrap: strAttr(bodyPr, 'wrap'),
    autoSize,
    anchor: strAttr(bodyPr, 'anchor'),
    verticalText: strAttr(bodyPr, 'vert'),
    rotation: intAttr(bodyPr, 'rot'),
    insets: {
      left: intAttr(bodyPr, 'lIns'),
      top: intAttr(bodyPr, 'tIns'),
      right: intAttr(bodyPr, 'rIns'),
      bottom: intAttr(bodyPr, 'bIns'),
    },
  };
}
