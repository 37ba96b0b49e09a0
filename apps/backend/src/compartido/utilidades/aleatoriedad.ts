/**
 * Fuentes de aleatoriedad inyectables.
 *
 * Todo el codigo que sortea recibe una funcion `Aleatorio` en lugar de leer
 * `Math.random` directamente; con una semilla fija la salida es reproducible.
 */

/** Devuelve un numero en [0, 1). */
export type Aleatorio = () => number;

export function hash32(input: string) {
  // FNV-1a 32-bit
  let h = 0x811c9dc5;
  for (let i = 0; i < input.length; i += 1) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export function mulberry32(seed: number): Aleatorio {
  let estado = seed >>> 0;
  return function () {
    let t = (estado = (estado + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Crea un generador a partir de una semilla numerica o de texto.
 * Sin semilla se usa `Math.random`.
 */
export function crearAleatorio(semilla?: number | string): Aleatorio {
  if (semilla === undefined || semilla === '') return Math.random;
  const numero = typeof semilla === 'number' ? semilla : hash32(semilla);
  return mulberry32(Math.trunc(numero));
}

/**
 * Indice entero uniforme en [0, limite).
 */
export function enteroAleatorio(aleatorio: Aleatorio, limite: number) {
  const indice = Math.floor(aleatorio() * limite);
  // Una fuente mal portada podria devolver 1; se acota.
  return Math.min(limite - 1, Math.max(0, indice));
}

/**
 * Muestra de `cantidad` elementos distintos, uniforme y sin reemplazo
 * (Fisher-Yates parcial). El orden de la muestra tambien es aleatorio.
 */
export function muestrearSinReemplazo<T>(items: readonly T[], cantidad: number, aleatorio: Aleatorio): T[] {
  if (!Number.isInteger(cantidad) || cantidad < 0 || cantidad > items.length) {
    throw new RangeError(`No se pueden tomar ${cantidad} elementos de ${items.length}`);
  }
  const copia = items.slice();
  for (let i = 0; i < cantidad; i += 1) {
    const j = i + enteroAleatorio(aleatorio, copia.length - i);
    const tmp = copia[i];
    copia[i] = copia[j];
    copia[j] = tmp;
  }
  return copia.slice(0, cantidad);
}
