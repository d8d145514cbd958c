import { Resource, ResourceCategory } from '../entities/resource.entity';

/**
 * Storage port for resources. The booking engine only reads through it;
 * writes come from resource administration.
 */
export abstract class ResourceRepository {
  abstract findById(id: string): Promise<Resource | null>;

  /** Ordered by name. */
  abstract findAll(category?: ResourceCategory): Promise<Resource[]>;

  abstract save(resource: Resource): Promise<Resource>;

  abstract count(): Promise<number>;
}
