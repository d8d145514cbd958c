import { readFileSync } from 'fs';
import {
  Resource,
  ResourceCategory,
  ResourceStatus,
} from './entities/resource.entity';

interface DemoResourceEntry {
  id: string;
  name: string;
  category: ResourceCategory;
  capacity: number;
  location?: string;
  description?: string;
}

const isCategory = (value: unknown): value is ResourceCategory =>
  Object.values(ResourceCategory).some((category) => category === value);

function isDemoResourceEntry(value: unknown): value is DemoResourceEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'id' in value &&
    typeof value.id === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'category' in value &&
    isCategory(value.category) &&
    'capacity' in value &&
    typeof value.capacity === 'number' &&
    Number.isInteger(value.capacity) &&
    value.capacity > 0
  );
}

/**
 * Reads the seed resources for an in-memory run from a JSON array file.
 */
export function loadDemoResources(path: string): Resource[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Demo resource file ${path} must contain a JSON array`);
  }

  const loadedAt = new Date();
  return parsed.map((entry: unknown, index) => {
    if (!isDemoResourceEntry(entry)) {
      throw new Error(`Invalid demo resource at index ${index} in ${path}`);
    }
    return {
      id: entry.id,
      name: entry.name,
      category: entry.category,
      capacity: entry.capacity,
      status: ResourceStatus.AVAILABLE,
      location: entry.location ?? null,
      description: entry.description ?? null,
      created_at: loadedAt,
      updated_at: loadedAt,
    };
  });
}
