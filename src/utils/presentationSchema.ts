import { z } from "zod";
import type { Presentation } from "../types.ts";

const str = z.string().nullable();
const num = z.number().nullable();

const color = z.object({ rgb: str, themeColor: str, brightness: num });
const spacing = z.object({ value: z.number(), unit: z.enum(['lines', 'pt']) });

const textRun = z.object({
  text: z.string(),
  fontName: str,
  fontSizePt: num,
  bold: z.boolean().nullable(),
  italic: z.boolean().nullable(),
  underline: str,
  color: color.nullable(),
  strike: str,
  kerning: num,
  spacing: num,
  caps: str,
  superscript: num,
  subscript: num,
  highlight: color.nullable(),
  outline: z.object({ widthEmu: num, color: color.nullable() }).nullable(),
  hyperlink: str,
});

const bullet = z.object({
  type: z.enum(['char', 'autoNumber', 'picture', 'none']),
  character: str,
  numberingScheme: str,
  startAt: num,
  font: str,
  color: color.nullable(),
  sizePercent: num,
});

const paragraph = z.object({
  formatting: z.object({
    alignment: str,
    level: z.number(),
    lineSpacing: spacing.nullable(),
    spaceBefore: spacing.nullable(),
    spaceAfter: spacing.nullable(),
    indent: num,
    leftIndent: num,
    rightIndent: num,
    bullet: bullet.nullable(),
    textDirection: z.enum(['rtl', 'ltr']).nullable(),
  }),
  runs: z.array(textRun),
  text: z.string(),
});

const fill = z.object({
  type: z.enum(['solid', 'gradient', 'pattern', 'picture', 'none', 'group']),
  color: color.nullable(),
  gradientStops: z.array(z.object({ position: z.number(), color: color.nullable() })),
  pattern: str,
});

const dimensions = z.object({
  left: z.number(),
  top: z.number(),
  width: z.number(),
  height: z.number(),
  rotation: num,
});

const elementBase = z.object({
  shapeId: z.number().int(),
  shapeName: z.string(),
  isGrouped: z.boolean(),
  groupId: num,
  placeholder: z.object({ type: z.string(), idx: num }).nullable(),
  fill: fill.nullable(),
  line: z.object({ widthEmu: num, dashStyle: str, color: color.nullable(), hasLine: z.boolean() }).nullable(),
  shadow: z
    .object({ kind: z.string(), blurRadius: num, distance: num, direction: num, color: color.nullable() })
    .nullable(),
  dimensions: dimensions.nullable(),
});

const textFields = elementBase.extend({
  textFrame: z
    .object({
      wrap: str,
      autoSize: z.enum(['normal', 'shape', 'none']).nullable(),
      anchor: str,
      verticalText: str,
      rotation: num,
      insets: z.object({ left: num, top: num, right: num, bottom: num }),
    })
    .nullable(),
  paragraphs: z.array(paragraph),
  fullText: z.string(),
});

const element = z.discriminatedUnion('elementType', [
  textFields.extend({ elementType: z.literal('TextBox') }),
  textFields.extend({ elementType: z.literal('AutoShape') }),
  elementBase.extend({
    elementType: z.literal('Table'),
    table: z.object({
      rows: z.number(),
      columns: z.number(),
      cells: z.array(z.object({ row: z.number(), column: z.number(), text: z.string(), paragraphs: z.array(paragraph) })),
    }),
  }),
  elementBase.extend({
    elementType: z.literal('Chart'),
    chart: z.object({
      partName: z.string(),
      chartType: str,
      title: str,
      seriesNames: z.array(z.string()),
      categories: z.array(z.string()),
      axisTitles: z.object({ category: str, value: str, series: str }),
      dataLabels: z.array(z.object({ seriesIndex: z.number(), pointIndex: z.number(), text: z.string() })),
      values: z.array(z.array(num)),
    }),
  }),
  elementBase.extend({
    elementType: z.literal('Picture'),
    image: z.object({ description: str, altText: str }),
  }),
  elementBase.extend({ elementType: z.literal('Other'), shapeKind: z.string() }),
]);

const background = z.object({ followsMaster: z.boolean(), fill: fill.nullable() });

const slide = z.object({
  slideNumber: z.number().int(),
  layoutInfo: z.object({ name: str, partName: str, masterIndex: num, layoutIndex: num }),
  background,
  elements: z.array(element),
  links: z.array(z.object({ shapeId: z.number(), text: z.string(), url: z.string() })),
  speakerNotes: z.object({ paragraphs: z.array(paragraph), text: z.string() }).nullable(),
  diagramNodes: z.array(
    z.object({ nodeId: z.string(), parentId: str, level: num, text: z.string(), partName: z.string() })
  ),
});

const master = z.object({
  masterIndex: z.number(),
  name: str,
  partName: z.string(),
  background,
  layouts: z.array(
    z.object({
      layoutIndex: z.number(),
      name: str,
      partName: z.string(),
      placeholders: z.array(
        z.object({ name: z.string(), type: z.string(), idx: num, dimensions: dimensions.nullable() })
      ),
    })
  ),
});

/** The presentation tree as written to and read from the JSON hand-off files. */
export const presentationSchema: z.ZodType<Presentation> = z.object({
  name: z.string(),
  totalSlides: z.number(),
  slideWidth: z.number(),
  slideHeight: z.number(),
  masters: z.array(master),
  slides: z.array(slide),
  targetLanguage: str,
  targetLanguageTag: str,
  isRightToLeft: z.boolean(),
});

/** First issue of a failed parse, as `path: message`. */
export function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) return error.message;
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
