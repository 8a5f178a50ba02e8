import type { docs_v1 } from 'googleapis';

// Offsets are Google Docs indexes: UTF-16 code units, body content starts at 1,
// ranges are half-open [startIndex, endIndex).

export interface TextRange {
  startIndex: number;
  endIndex: number;
}

export type NamedStyleType = 'TITLE' | 'HEADING_1' | 'HEADING_2' | 'NORMAL_TEXT';

export interface TextStyleAttrs {
  bold?: boolean;
  italic?: boolean;
}

export interface ParagraphStyleAttrs {
  namedStyleType: NamedStyleType;
}

export type EditOperation =
  | { kind: 'insertText'; index: number; text: string }
  | { kind: 'setTextStyle'; range: TextRange; style: TextStyleAttrs }
  | { kind: 'setParagraphStyle'; range: TextRange; style: ParagraphStyleAttrs };

/** First insertable position of an empty document. */
export const DOCUMENT_START_INDEX = 1;

// The API only touches the attributes named in `fields`; everything else keeps its
// current value.
function fieldMask(style: object): string {
  return Object.entries(style)
    .filter(([, value]) => value !== undefined)
    .map(([key]) => key)
    .join(',');
}

export function toDocsRequest(op: EditOperation): docs_v1.Schema$Request {
  switch (op.kind) {
    case 'insertText':
      return { insertText: { location: { index: op.index }, text: op.text } };
    case 'setTextStyle':
      return {
        updateTextStyle: {
          range: { startIndex: op.range.startIndex, endIndex: op.range.endIndex },
          textStyle: { ...op.style },
          fields: fieldMask(op.style),
        },
      };
    case 'setParagraphStyle':
      return {
        updateParagraphStyle: {
          range: { startIndex: op.range.startIndex, endIndex: op.range.endIndex },
          paragraphStyle: { namedStyleType: op.style.namedStyleType },
          fields: 'namedStyleType',
        },
      };
  }
}

export function toDocsRequests(ops: readonly EditOperation[]): docs_v1.Schema$Request[] {
  return ops.map(toDocsRequest);
}
