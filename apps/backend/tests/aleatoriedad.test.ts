/**
 * aleatoriedad.test
 *
 * Pruebas de utilidades de aleatoriedad.
 */
import { describe, expect, it } from 'vitest';
import {
  crearAleatorio,
  enteroAleatorio,
  hash32,
  muestrearSinReemplazo
} from '../src/compartido/utilidades/aleatoriedad';

function tomar(aleatorio: () => number, n: number) {
  return Array.from({ length: n }, () => aleatorio());
}

describe('crearAleatorio', () => {
  it('produce la misma secuencia para la misma semilla numerica o de texto', () => {
    expect(tomar(crearAleatorio(42), 5)).toEqual(tomar(crearAleatorio(42), 5));
    expect(tomar(crearAleatorio('feria'), 5)).toEqual(tomar(crearAleatorio('feria'), 5));
    expect(tomar(crearAleatorio('feria'), 5)).toEqual(tomar(crearAleatorio(hash32('feria')), 5));
  });

  it('entrega valores en [0, 1)', () => {
    for (const valor of tomar(crearAleatorio(123), 200)) {
      expect(valor).toBeGreaterThanOrEqual(0);
      expect(valor).toBeLessThan(1);
    }
  });

  it('sin semilla usa Math.random', () => {
    expect(crearAleatorio()).toBe(Math.random);
    expect(crearAleatorio('')).toBe(Math.random);
  });
});

describe('enteroAleatorio', () => {
  it('acota fuentes que devuelven 1', () => {
    expect(enteroAleatorio(() => 1, 5)).toBe(4);
    expect(enteroAleatorio(() => 0, 5)).toBe(0);
    expect(enteroAleatorio(() => 0.5, 4)).toBe(2);
  });
});

describe('muestrearSinReemplazo', () => {
  it('devuelve la cantidad pedida sin repetidos', () => {
    const items = Array.from({ length: 40 }, (_, i) => `img-${i}`);
    const muestra = muestrearSinReemplazo(items, 16, crearAleatorio(99));

    expect(muestra).toHaveLength(16);
    expect(new Set(muestra).size).toBe(16);
    for (const item of muestra) expect(items).toContain(item);
  });

  it('con una fuente constante en 0 toma los primeros en orden', () => {
    expect(muestrearSinReemplazo(['a', 'b', 'c', 'd'], 3, () => 0)).toEqual(['a', 'b', 'c']);
  });

  it('rechaza cantidades imposibles', () => {
    expect(() => muestrearSinReemplazo([1, 2, 3], 4, Math.random)).toThrow(RangeError);
    expect(() => muestrearSinReemplazo([1, 2, 3], -1, Math.random)).toThrow(RangeError);
    expect(() => muestrearSinReemplazo([1, 2, 3], 1.5, Math.random)).toThrow(RangeError);
  });
});
