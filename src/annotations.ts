/**
 * @module annotations
 *
 * Image overlays attached to an open slide.
 */

import { AnnotationFormat, type SlideAnnotation } from './types.js';

/** Handle returned by {@link AnnotationStore.add}. */
export type AnnotationId = number;

/**
 * Validated, insertion-ordered annotation list.
 *
 * Image data is held as given; pass a strong buffer if the caller's region
 * may be recycled while the annotation is shown.
 */
export class AnnotationStore {
  private readonly items = new Map<AnnotationId, SlideAnnotation>();
  private nextId: AnnotationId = 1;

  get size(): number {
    return this.items.size;
  }

  /**
   * @throws {RangeError} If the format is not PNG or JPEG, an offset lies
   *   outside `[0, 1]`, the dimensions are not positive integers, or the
   *   image data is empty.
   */
  add(annotation: SlideAnnotation): AnnotationId {
    validateAnnotation(annotation);
    const id = this.nextId++;
    this.items.set(id, { ...annotation });
    return id;
  }

  get(id: AnnotationId): SlideAnnotation | undefined {
    return this.items.get(id);
  }

  remove(id: AnnotationId): boolean {
    return this.items.delete(id);
  }

  /** Annotations in insertion order. */
  entries(): Array<[AnnotationId, SlideAnnotation]> {
    return [...this.items];
  }

  /** @returns Number of annotations removed. */
  clear(): number {
    const count = this.items.size;
    this.items.clear();
    return count;
  }
}

function validateAnnotation(annotation: SlideAnnotation): void {
  const { format, xOffset, yOffset, width, height, data } = annotation;
  if (format !== AnnotationFormat.Png && format !== AnnotationFormat.Jpeg) {
    throw new RangeError(`Unsupported annotation format ${format}`);
  }
  if (!isUnitInterval(xOffset) || !isUnitInterval(yOffset)) {
    throw new RangeError(`Annotation offset (${xOffset}, ${yOffset}) outside [0, 1]`);
  }
  if (!Number.isSafeInteger(width) || width <= 0 || !Number.isSafeInteger(height) || height <= 0) {
    throw new RangeError(`Invalid annotation size ${width}x${height}`);
  }
  if (data.size === 0) {
    throw new RangeError('Annotation image data is empty');
  }
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}
