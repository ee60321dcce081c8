/**
 * Tests unitarios para core/engines/MirrorStore.ts
 */
import { MirrorStore } from '../../core/engines/MirrorStore';
import type { MirrorSite } from '../../core/engines/types';

function mirror(name: string, overrides: Partial<MirrorSite> = {}): MirrorSite {
  return {
    name,
    baseUrl: `https://${name}.example`,
    country: null,
    priority: 1,
    isActive: true,
    healthScore: 1,
    failureCount: 0,
    lastChecked: null,
    lastError: null,
    unavailableUntil: null,
    ...overrides,
  };
}

describe('MirrorStore', () => {
  describe('sin inicializar', () => {
    it('debe lanzar al usar statements', () => {
      const store = new MirrorStore(':memory:');
      expect(store.isInitialized).toBe(false);
      expect(() => store.loadMirrors()).toThrow('El almacén de mirrors no está inicializado');
    });
  });

  describe('en memoria', () => {
    let store: MirrorStore;

    beforeEach(() => {
      store = new MirrorStore(':memory:');
      expect(store.initialize()).toBe(true);
    });

    afterEach(() => {
      store.close();
    });

    it('initialize debe ser idempotente', () => {
      expect(store.initialize()).toBe(true);
    });

    it('debe guardar y cargar mirrors en orden de posición', () => {
      store.saveMirrors([
        mirror('beta', { country: 'ES', priority: 2, healthScore: 0.4, failureCount: 3, lastError: 'HTTP 503' }),
        mirror('alpha', { isActive: false, unavailableUntil: 5000, lastChecked: 1000 }),
      ]);

      expect(store.loadMirrors()).toEqual([
        mirror('beta', { country: 'ES', priority: 2, healthScore: 0.4, failureCount: 3, lastError: 'HTTP 503' }),
        mirror('alpha', { isActive: false, unavailableUntil: 5000, lastChecked: 1000 }),
      ]);
    });

    it('debe actualizar un mirror existente por nombre', () => {
      store.saveMirror(mirror('alpha'), 0);
      store.saveMirror(mirror('alpha', { healthScore: 0.5 }), 0);

      const loaded = store.loadMirrors();
      expect(loaded).toHaveLength(1);
      expect(loaded[0].healthScore).toBe(0.5);
    });

    it('debe guardar, actualizar y borrar disponibilidad', () => {
      store.saveMirror(mirror('alpha'), 0);
      store.saveAvailability({ mirror: 'alpha', identifier: '42', state: 'absent', verifiedAt: 100 });
      store.saveAvailability({ mirror: 'alpha', identifier: '42', state: 'present', verifiedAt: 200 });

      expect(store.loadAvailability()).toEqual([
        { mirror: 'alpha', identifier: '42', state: 'present', verifiedAt: 200 },
      ]);

      store.deleteAvailability('alpha', '42');
      expect(store.loadAvailability()).toEqual([]);
    });

    it('debe rechazar disponibilidad de un mirror no guardado', () => {
      expect(() =>
        store.saveAvailability({ mirror: 'ghost', identifier: '1', state: 'absent', verifiedAt: 1 })
      ).toThrow();
    });

    it('debe rechazar una salud fuera de rango', () => {
      expect(() => store.saveMirror(mirror('bad', { healthScore: 1.5 }), 0)).toThrow();
    });
  });

  it('close debe dejar el store sin inicializar', () => {
    const store = new MirrorStore(':memory:');
    store.initialize();
    store.close();
    expect(store.isInitialized).toBe(false);
    store.close();
  });
});
