import { Region, type RectEdges, type RegionOptions } from '../utils/region';
import type { DetectRegionData } from '../types/sample';
import { detectRegionSchema, parseRecord } from './records';

export interface DetectionMeta {
  classId: string;
  confidence: number;
  isOccluded: number;
  isTruncated: number;
  isGroupOf: number;
  isDepiction: number;
  isInside: number;
}

/**
 * One ground-truth bounding box. Coordinates are fractions of the image
 * width/height, so the region defaults to float mode.
 */
export class DetectRegion extends Region {
  classId = '';
  confidence = 1.0;
  isOccluded = 0;
  isTruncated = 0;
  isGroupOf = 0;
  isDepiction = 0;
  isInside = 0;

  constructor(rect: Partial<RectEdges> = {}, meta: Partial<DetectionMeta> = {}, options: RegionOptions = {}) {
    super(rect, { forceInt: options.forceInt ?? false });
    Object.assign(this, meta);
  }

  meta(): DetectionMeta {
    return {
      classId: this.classId,
      confidence: this.confidence,
      isOccluded: this.isOccluded,
      isTruncated: this.isTruncated,
      isGroupOf: this.isGroupOf,
      isDepiction: this.isDepiction,
      isInside: this.isInside,
    };
  }

  override clone(): DetectRegion {
    return new DetectRegion(this.edges(), this.meta(), { forceInt: this.forceInt });
  }

  /** Pixel-space box for an image of the given size, edges truncated. */
  toPixelRegion(imageWidth: number, imageHeight: number): Region {
    return new Region({
      left: Math.trunc(this.left * imageWidth),
      right: Math.trunc(this.right * imageWidth),
      top: Math.trunc(this.top * imageHeight),
      bottom: Math.trunc(this.bottom * imageHeight),
    });
  }

  encode(): DetectRegionData {
    return {
      left: this.left,
      right: this.right,
      top: this.top,
      bottom: this.bottom,
      class_id: this.classId,
      confidence: this.confidence,
      is_occluded: this.isOccluded,
      is_truncated: this.isTruncated,
      is_group_of: this.isGroupOf,
      is_depiction: this.isDepiction,
      is_inside: this.isInside,
    };
  }

  static decode(data: unknown): DetectRegion {
    return DetectRegion.fromRecord(parseRecord(detectRegionSchema, data, 'detect region'));
  }

  static fromRecord(record: DetectRegionData): DetectRegion {
    return new DetectRegion(
      { left: record.left, right: record.right, top: record.top, bottom: record.bottom },
      {
        classId: record.class_id,
        confidence: record.confidence,
        isOccluded: record.is_occluded,
        isTruncated: record.is_truncated,
        isGroupOf: record.is_group_of,
        isDepiction: record.is_depiction,
        isInside: record.is_inside,
      },
      { forceInt: false },
    );
  }
}
