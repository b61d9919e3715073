import type { ErrorKind } from './errors.js';
import type { Category, Routing, Severity } from './taxonomy.js';

export interface GeoLocation {
  lat: number;
  lng: number;
}

export interface Complaint {
  text: string;
  submitted_at?: string;
  location?: GeoLocation;
}

export type NormalizationFlag = 'control_characters_removed' | 'delimiters_removed';

export interface NormalizedComplaint {
  text: string;
  flags: NormalizationFlag[];
}

export interface ParsedAssessment {
  category: Category;
  severity: Severity;
  tags: string[];
  rationale: string;
  confidence: number | null;
  suggested_actions: string[];
}

export interface AnalysisResult extends ParsedAssessment {
  request_id: string;
  received_at: string;
  submitted_at?: string;
  text: string;
  routing: Routing;
  taxonomy_version: string;
  model: string;
  attempts: number;
  location?: GeoLocation;
  normalization_flags: NormalizationFlag[];
}

export interface AnalysisFailure {
  request_id: string;
  error_kind: ErrorKind;
  message: string;
}
