export type Category = 'roads' | 'lighting' | 'water/drainage' | 'sanitation' | 'other';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export interface CategoryDefinition {
  id: Category;
  description: string;
  // Closed list of issue types a complaint in this category may be tagged with
  tags: readonly string[];
}

export interface Taxonomy {
  version: string;
  categories: readonly CategoryDefinition[];
  // Ordered from least to most urgent
  severities: readonly Severity[];
}

export interface Routing {
  department: string;
  contact_email: string;
  contact_phone: string;
  response_time: string;
}
