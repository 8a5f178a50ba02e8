import type { ContentPlan, Scene } from '../plan/types.js';
import { ValidationError } from '../../utils/errors.js';
import { DOCUMENT_START_INDEX, type EditOperation, type NamedStyleType } from './edit-operations.js';

/**
 * Single forward pass over the document: every insert lands at the cursor, the
 * styles that follow it address only the text just written, then the cursor
 * moves past it. Later offsets therefore depend on every earlier insert.
 */
class DocumentBuilder {
  private ops: EditOperation[] = [];
  private cursor = DOCUMENT_START_INDEX;

  paragraph(text: string, namedStyleType: NamedStyleType): void {
    const start = this.insertLine(text);
    this.ops.push({ kind: 'setParagraphStyle', range: { startIndex: start, endIndex: this.cursor }, style: { namedStyleType } });
  }

  /** `Label: value` body line with the label (and its colon) in bold. */
  labeled(label: string, value: string): void {
    const start = this.insertLine(`${label}: ${value}`);
    this.ops.push({ kind: 'setParagraphStyle', range: { startIndex: start, endIndex: this.cursor }, style: { namedStyleType: 'NORMAL_TEXT' } });
    this.ops.push({ kind: 'setTextStyle', range: { startIndex: start, endIndex: start + label.length + 1 }, style: { bold: true } });
  }

  build(): EditOperation[] {
    return this.ops;
  }

  private insertLine(content: string): number {
    const text = `${content}\n`;
    const start = this.cursor;
    this.ops.push({ kind: 'insertText', index: start, text });
    // String length counts UTF-16 code units, the same unit Docs indexes by.
    this.cursor += text.length;
    return start;
  }
}

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

function seconds(value: number): string {
  return `${value} seconds`;
}

export function sceneHeading(scene: Scene, position: number): string {
  const n = scene.scene_number ?? position + 1;
  return scene.duration !== undefined ? `Scene ${n}: ${seconds(scene.duration)}` : `Scene ${n}`;
}

export function documentTitle(plan: Pick<ContentPlan, 'title'>): string {
  return `Short-form Content Plan: ${present(plan.title) ? plan.title.trim() : 'Untitled'}`;
}

/**
 * Renders a content plan into the edit operations for an empty document.
 * Absent or blank fields produce nothing; only a missing topic is an error.
 * Scenes keep their input order whatever their `scene_number`.
 */
export function formatContentPlan(plan: ContentPlan): EditOperation[] {
  if (!present(plan.topic)) {
    throw new ValidationError('Content plan topic is required', ['topic: Topic is required']);
  }
  const doc = new DocumentBuilder();

  if (present(plan.title)) doc.paragraph(plan.title.trim(), 'TITLE');

  doc.labeled('Topic', plan.topic.trim());
  if (plan.duration !== undefined) doc.labeled('Duration', seconds(plan.duration));
  if (present(plan.key_message)) doc.labeled('Key Message', plan.key_message.trim());

  const scenes = plan.scenes ?? [];
  if (scenes.length > 0) {
    doc.paragraph('Scene Breakdown', 'HEADING_1');
    scenes.forEach((scene, i) => {
      doc.paragraph(sceneHeading(scene, i), 'HEADING_2');
      if (present(scene.subtitle)) doc.labeled('Subtitle', scene.subtitle.trim());
      if (present(scene.narration)) doc.labeled('Narration', scene.narration.trim());
      if (present(scene.visual_description)) doc.labeled('Visual Reference', scene.visual_description.trim());
    });
  }

  if (present(plan.conclusion)) doc.labeled('Conclusion', plan.conclusion.trim());

  return doc.build();
}
