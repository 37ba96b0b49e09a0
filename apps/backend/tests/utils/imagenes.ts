/**
 * Fixtures de imagenes generadas en memoria con sharp.
 */
import sharp from 'sharp';
import type { FuenteMedible } from '../../src/modulos/modulo_loteria/domain/textoLayout';
import type { EntradaImagen, ImagenLoteria } from '../../src/modulos/modulo_loteria/shared/tiposLoteria';

export async function crearPng(ancho: number, alto: number, color: { r: number; g: number; b: number }) {
  return sharp({ create: { width: ancho, height: alto, channels: 3, background: color } })
    .png()
    .toBuffer();
}

export function nombreCarta(indice: number) {
  return `carta ${String(indice + 1).padStart(2, '0')}`;
}

/** `cantidad` imagenes de 8x6 con colores distintos: "carta 01", "carta 02", ... */
export async function crearEntradas(cantidad: number): Promise<EntradaImagen[]> {
  const entradas: EntradaImagen[] = [];
  for (let i = 0; i < cantidad; i += 1) {
    entradas.push({
      nombre: nombreCarta(i),
      contenido: await crearPng(8, 6, { r: (i * 37) % 256, g: (i * 91) % 256, b: 200 })
    });
  }
  return entradas;
}

/** Pool sin bytes reales, para pruebas que no rasterizan. */
export function crearPoolFalso(cantidad: number): ImagenLoteria[] {
  return Array.from({ length: cantidad }, (_, i) => ({
    id: nombreCarta(i),
    contenido: Buffer.alloc(0),
    ancho: 100,
    alto: 100
  }));
}

/** Fuente monoespaciada: cada caracter mide `tamano / 2` y la linea `tamano`. */
export const fuenteMonoespaciada: FuenteMedible = {
  anchoTexto: (texto, tamano) => texto.length * (tamano / 2),
  altoLinea: (tamano) => tamano
};

/** Canal `canal` (0 = r) del pixel (x, y) de un raster RGB crudo. */
export function pixel(raster: Buffer, anchoRaster: number, x: number, y: number) {
  const indice = (y * anchoRaster + x) * 3;
  return [raster[indice], raster[indice + 1], raster[indice + 2]];
}
