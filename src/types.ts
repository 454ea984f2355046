export type ElementType = 'TextBox' | 'AutoShape' | 'Table' | 'Chart' | 'Picture' | 'Other';

export interface ColorSpec {
  rgb: string | null;
  themeColor: string | null;
  brightness: number | null;
}

export interface Spacing {
  value: number;
  unit: 'lines' | 'pt';
}

export interface OutlineFormat {
  widthEmu: number | null;
  color: ColorSpec | null;
}

export interface TextRun {
  text: string;
  fontName: string | null;
  fontSizePt: number | null;
  bold: boolean | null;
  italic: boolean | null;
  underline: string | null;
  color: ColorSpec | null;
  strike: string | null;
  kerning: number | null;
  spacing: number | null;
  caps: string | null;
  superscript: number | null;
  subscript: number | null;
  highlight: ColorSpec | null;
  outline: OutlineFormat | null;
  hyperlink: string | null;
}

export interface BulletFormat {
  type: 'char' | 'autoNumber' | 'picture' | 'none';
  character: string | null;
  numberingScheme: string | null;
  startAt: number | null;
  font: string | null;
  color: ColorSpec | null;
  sizePercent: number | null;
}

export interface ParagraphFormatting {
  alignment: string | null;
  level: number;
  lineSpacing: Spacing | null;
  spaceBefore: Spacing | null;
  spaceAfter: Spacing | null;
  indent: number | null;
  leftIndent: number | null;
  rightIndent: number | null;
  bullet: BulletFormat | null;
  textDirection: 'rtl' | 'ltr' | null;
}

export interface Paragraph {
  formatting: ParagraphFormatting;
  runs: TextRun[];
  /** Derived: concatenation of the run texts. */
  text: string;
}

export interface FillInfo {
  type: 'solid' | 'gradient' | 'pattern' | 'picture' | 'none' | 'group';
  color: ColorSpec | null;
  gradientStops: Array<{ position: number; color: ColorSpec | null }>;
  pattern: string | null;
}

export interface LineInfo {
  widthEmu: number | null;
  dashStyle: string | null;
  color: ColorSpec | null;
  hasLine: boolean;
}

export interface ShadowInfo {
  kind: string;
  blurRadius: number | null;
  distance: number | null;
  direction: number | null;
  color: ColorSpec | null;
}

export interface Dimensions {
  left: number;
  top: number;
  width: number;
  height: number;
  rotation: number | null;
}

export interface PlaceholderInfo {
  type: string;
  idx: number | null;
}

export interface TextFrameProperties {
  wrap: string | null;
  autoSize: 'normal' | 'shape' | 'none' | null;
  anchor: string | null;
  verticalText: string | null;
  rotation: number | null;
  insets: {
    left: number | null;
    top: number | null;
    right: number | null;
    bottom: number | null;
  };
}

interface ElementBase {
  shapeId: number;
  shapeName: string;
  isGrouped: boolean;
  groupId: number | null;
  placeholder: PlaceholderInfo | null;
  fill: FillInfo | null;
  line: LineInfo | null;
  shadow: ShadowInfo | null;
  dimensions: Dimensions | null;
}

export interface TextElement extends ElementBase {
  elementType: 'TextBox' | 'AutoShape';
  textFrame: TextFrameProperties | null;
  paragraphs: Paragraph[];
  /** Derived: paragraph texts joined by newlines. */
  fullText: string;
}

export interface TableCell {
  row: number;
  column: number;
  text: string;
  paragraphs: Paragraph[];
}

export interface TableElement extends ElementBase {
  elementType: 'Table';
  table: {
    rows: number;
    columns: number;
    cells: TableCell[];
  };
}

export interface DataLabel {
  seriesIndex: number;
  pointIndex: number;
  text: string;
}

export interface ChartData {
  partName: string;
  chartType: string | null;
  title: string | null;
  seriesNames: string[];
  categories: string[];
  axisTitles: {
    category: string | null;
    value: string | null;
    series: string | null;
  };
  dataLabels: DataLabel[];
  values: Array<Array<number | null>>;
}

export interface ChartElement extends ElementBase {
  elementType: 'Chart';
  chart: ChartData;
}

export interface PictureElement extends ElementBase {
  elementType: 'Picture';
  image: {
    description: string | null;
    altText: string | null;
  };
}

export interface OtherElement extends ElementBase {
  elementType: 'Other';
  shapeKind: string;
}

export type SlideElement = TextElement | TableElement | ChartElement | PictureElement | OtherElement;

export interface DiagramNode {
  nodeId: string;
  parentId: string | null;
  level: number | null;
  text: string;
  partName: string;
}

export interface SpeakerNotes {
  paragraphs: Paragraph[];
  text: string;
}

export interface SlideLink {
  shapeId: number;
  text: string;
  url: string;
}

export interface LayoutInfo {
  name: string | null;
  partName: string | null;
  masterIndex: number | null;
  layoutIndex: number | null;
}

export interface BackgroundInfo {
  followsMaster: boolean;
  fill: FillInfo | null;
}

export interface Slide {
  slideNumber: number;
  layoutInfo: LayoutInfo;
  background: BackgroundInfo;
  elements: SlideElement[];
  links: SlideLink[];
  speakerNotes: SpeakerNotes | null;
  diagramNodes: DiagramNode[];
}

export interface LayoutPlaceholder {
  name: string;
  type: string;
  idx: number | null;
  dimensions: Dimensions | null;
}

export interface LayoutSummary {
  layoutIndex: number;
  name: string | null;
  partName: string;
  placeholders: LayoutPlaceholder[];
}

export interface MasterSummary {
  masterIndex: number;
  name: string | null;
  partName: string;
  background: BackgroundInfo;
  layouts: LayoutSummary[];
}

export interface Presentation {
  name: string;
  totalSlides: number;
  slideWidth: number;
  slideHeight: number;
  masters: MasterSummary[];
  slides: Slide[];
  targetLanguage: string | null;
  targetLanguageTag: string | null;
  isRightToLeft: boolean;
}
