import { SourceRegistry } from '../../../src/sources/sourceRegistry';
import { FakeSource } from '../../helpers/fixtures';

describe('SourceRegistry', () => {
  it('should keep registration order', () => {
    const source = new FakeSource();

    const registry = new SourceRegistry().register('club-b', source).register('club-a', source);

    expect(registry.sourceIds()).toEqual(['club-b', 'club-a']);
    expect(registry.size).toBe(2);
    expect(registry.has('club-a')).toBe(true);
    expect(registry.get('club-c')).toBeUndefined();
  });

  it('should refuse a second adapter for the same source', () => {
    const registry = new SourceRegistry().register('club-a', new FakeSource());

    expect(() => registry.register('club-a', new FakeSource())).toThrow('Source already registered: club-a');
  });
});
