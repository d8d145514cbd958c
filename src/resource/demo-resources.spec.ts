import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadDemoResources } from './demo-resources';
import { ResourceCategory, ResourceStatus } from './entities/resource.entity';

describe('loadDemoResources', () => {
  const writeSeed = (content: string): string => {
    const path = join(mkdtempSync(join(tmpdir(), 'demo-resources-')), 'seed.json');
    writeFileSync(path, content);
    return path;
  };

  it('should load the bundled demo resources', () => {
    const resources = loadDemoResources(
      join(__dirname, '..', '..', 'fixtures', 'demo-resources.json'),
    );

    expect(resources).toHaveLength(8);
    expect(resources[0]).toMatchObject({
      id: '6f1c2a4e-0b7d-4c1e-9a55-1d2f3e4a5b01',
      name: 'Pool Van 1',
      category: ResourceCategory.TRANSPORTATION,
      capacity: 12,
      status: ResourceStatus.AVAILABLE,
      location: 'Basement parking B1',
      description: null,
    });
  });

  it('should reject a file that is not an array', () => {
    const path = writeSeed('{"id": "x"}');

    expect(() => loadDemoResources(path)).toThrow(
      `Demo resource file ${path} must contain a JSON array`,
    );
  });

  it('should reject entries with an unknown category', () => {
    const path = writeSeed(
      JSON.stringify([{ id: 'r-1', name: 'Boat', category: 'BOAT', capacity: 4 }]),
    );

    expect(() => loadDemoResources(path)).toThrow(
      `Invalid demo resource at index 0 in ${path}`,
    );
  });
});
