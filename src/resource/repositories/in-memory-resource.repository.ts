import { Resource, ResourceCategory } from '../entities/resource.entity';
import { ResourceRepository } from './resource.repository';

/**
 * Map-backed resource store for tests and database-less runs. Each instance
 * owns its records; nothing is shared between instances.
 */
export class InMemoryResourceRepository extends ResourceRepository {
  private readonly resources = new Map<string, Resource>();

  constructor(seed: Resource[] = []) {
    super();
    for (const resource of seed) {
      this.resources.set(resource.id, { ...resource });
    }
  }

  async findById(id: string): Promise<Resource | null> {
    const resource = this.resources.get(id);
    return resource ? { ...resource } : null;
  }

  async findAll(category?: ResourceCategory): Promise<Resource[]> {
    return Array.from(this.resources.values())
      .filter((resource) => !category || resource.category === category)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((resource) => ({ ...resource }));
  }

  async save(resource: Resource): Promise<Resource> {
    this.resources.set(resource.id, { ...resource });
    return { ...resource };
  }

  async count(): Promise<number> {
    return this.resources.size;
  }
}
