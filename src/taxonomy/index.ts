import type { Category, Routing, Severity, Taxonomy } from '../types/index.js';
import { deepFreeze } from '../freeze.js';

export const TAXONOMY_V1: Taxonomy = deepFreeze<Taxonomy>({
  version: '1.0.0',
  categories: [
    {
      id: 'roads',
      description: 'Road surfaces, traffic signals, signage and footpaths',
      tags: ['pothole', 'road damage', 'traffic signal', 'signage', 'broken footpath']
    },
    {
      id: 'lighting',
      description: 'Street lights and other public lighting',
      tags: ['street light', 'flickering lamp', 'power outage', 'voltage issues', 'exposed cable']
    },
    {
      id: 'water/drainage',
      description: 'Water supply, pipes, sewers, storm drains and flooding',
      tags: ['pipe burst', 'low pressure', 'quality issue', 'meter problem', 'blocked drain', 'flooding', 'sewage leak']
    },
    {
      id: 'sanitation',
      description: 'Waste collection, bins, dumping and hazardous waste',
      tags: ['collection delay', 'bin overflow', 'illegal dumping', 'recycling', 'hazardous waste']
    },
    {
      id: 'other',
      description: 'Any infrastructure problem that fits none of the categories above',
      tags: ['fallen tree', 'damaged bench', 'graffiti', 'other']
    }
  ],
  severities: ['low', 'medium', 'high', 'critical']
});

const DEPARTMENTS: Readonly<Record<Category, Routing>> = deepFreeze<Record<Category, Routing>>({
  roads: {
    department: 'Roads and Transportation Department',
    contact_email: 'roads@city.gov',
    contact_phone: '+1-555-ROADS',
    response_time: '12-24 hours'
  },
  lighting: {
    department: 'Electricity Department',
    contact_email: 'electricity@city.gov',
    contact_phone: '+1-555-POWER',
    response_time: '2-12 hours'
  },
  'water/drainage': {
    department: 'Water Department',
    contact_email: 'water@city.gov',
    contact_phone: '+1-555-WATER',
    response_time: '24-48 hours'
  },
  sanitation: {
    department: 'Waste Management Department',
    contact_email: 'waste@city.gov',
    contact_phone: '+1-555-WASTE',
    response_time: '24-72 hours'
  },
  other: {
    department: 'General Services',
    contact_email: 'services@city.gov',
    contact_phone: '+1-555-CITY',
    response_time: '48-72 hours'
  }
});

export function routeFor(category: Category): Routing {
  return { ...DEPARTMENTS[category] };
}

export function listDepartments(): Record<Category, Routing> {
  return { ...DEPARTMENTS };
}

export function categoryIds(taxonomy: Taxonomy): Category[] {
  return taxonomy.categories.map(c => c.id);
}

export function isCategory(taxonomy: Taxonomy, value: string): value is Category {
  return taxonomy.categories.some(c => c.id === value);
}

// Tags are only meaningful within their own category
export function tagsFor(taxonomy: Taxonomy, category: Category): readonly string[] {
  return taxonomy.categories.find(c => c.id === category)?.tags ?? [];
}

export function listTags(taxonomy: Taxonomy): Partial<Record<Category, readonly string[]>> {
  const tags: Partial<Record<Category, readonly string[]>> = {};
  for (const definition of taxonomy.categories) {
    tags[definition.id] = definition.tags;
  }
  return tags;
}

export function isSeverity(taxonomy: Taxonomy, value: string): value is Severity {
  return taxonomy.severities.some(s => s === value);
}

const TAXONOMIES: Record<string, Taxonomy> = {
  [TAXONOMY_V1.version]: TAXONOMY_V1
};

export function getTaxonomy(version: string): Taxonomy | undefined {
  return TAXONOMIES[version];
}
