// On-disk shapes of a sample set file (sample_set_<index>.json)

export interface DetectRegionData {
  left: number; // normalized 0..1
  right: number;
  top: number;
  bottom: number;
  class_id: string; // key into the label map, e.g. "/m/0bt9lr"
  confidence: number;
  is_occluded: number;
  is_truncated: number;
  is_group_of: number;
  is_depiction: number;
  is_inside: number;
}

export interface SampleData {
  key: string;
  remote_path: string;
  detect_regions: DetectRegionData[];
}

export interface SampleSetData {
  set_index: number;
  samples: SampleData[];
}
