/**
 * Value objects de layout de la pagina de loteria.
 *
 * Pagina carta a 300 DPI (2550x3300 px). El tamano de celda se deriva una
 * sola vez del presupuesto de la tabla (titulo + folio + margenes) y se
 * reutiliza en las paginas de baraja, de modo que ambas comparten celdas.
 */
import type { Rect } from '../shared/tiposLoteria';

export const DIMENSION_CUADRICULA = 4;
export const IMAGENES_POR_TABLA = DIMENSION_CUADRICULA * DIMENSION_CUADRICULA;

export interface EspecificacionCuadricula {
  dimension: number;
  anchoPagina: number;
  altoPagina: number;
  margenIzquierdo: number;
  margenDerecho: number;
  margenSuperior: number;
  margenInferior: number;
  altoTitulo: number;
  altoFolio: number;
  separacion: number;
  tamanoTitulo: number;
  tamanoFolio: number;
  anchoContorno: number;
  paddingInferiorEtiqueta: number;
  paddingLateralEtiqueta: number;
  interlineado: number;
  bordeBaraja: {
    anchoExterior: number;
    insetInterior: number;
    anchoInterior: number;
  };
  altoBandaLeyenda: number;
}

export const CUADRICULA_CARTA: EspecificacionCuadricula = {
  dimension: DIMENSION_CUADRICULA,
  anchoPagina: 2550,
  altoPagina: 3300,
  margenIzquierdo: 150,
  margenDerecho: 150,
  margenSuperior: 100,
  margenInferior: 100,
  altoTitulo: 200,
  altoFolio: 80,
  separacion: 15,
  tamanoTitulo: 80,
  tamanoFolio: 40,
  anchoContorno: 2,
  paddingInferiorEtiqueta: 35,
  paddingLateralEtiqueta: 10,
  interlineado: 6,
  bordeBaraja: {
    anchoExterior: 5,
    insetInterior: 8,
    anchoInterior: 2
  },
  altoBandaLeyenda: 90
};

export interface TamanoCelda {
  ancho: number;
  alto: number;
}

/**
 * Division entera: el sobrante queda como margen al final de cada eje.
 */
export function calcularTamanoCelda(espec: EspecificacionCuadricula): TamanoCelda {
  const n = espec.dimension;
  const anchoDisponible = espec.anchoPagina - espec.margenIzquierdo - espec.margenDerecho;
  const altoDisponible =
    espec.altoPagina - espec.altoTitulo - espec.margenSuperior - espec.margenInferior - espec.altoFolio;

  const ancho = Math.floor((anchoDisponible - (n - 1) * espec.separacion) / n);
  const alto = Math.floor((altoDisponible - (n - 1) * espec.separacion) / n);
  if (!Number.isInteger(n) || n < 1 || ancho < 1 || alto < 1) {
    throw new Error(`Layout invalido: celda de ${ancho}x${alto} px para cuadricula ${n}x${n}`);
  }
  return { ancho, alto };
}

function calcularCeldas(espec: EspecificacionCuadricula, origenY: number): Rect[] {
  const { ancho, alto } = calcularTamanoCelda(espec);
  const celdas: Rect[] = [];
  for (let fila = 0; fila < espec.dimension; fila += 1) {
    for (let columna = 0; columna < espec.dimension; columna += 1) {
      celdas.push({
        x: espec.margenIzquierdo + columna * (ancho + espec.separacion),
        y: origenY + fila * (alto + espec.separacion),
        ancho,
        alto
      });
    }
  }
  return celdas;
}

/** Celdas de una tabla, en orden por filas, debajo de la banda de titulo. */
export function calcularCeldasTabla(espec: EspecificacionCuadricula = CUADRICULA_CARTA): Rect[] {
  return calcularCeldas(espec, espec.margenSuperior + espec.altoTitulo);
}

/** Celdas de una pagina de baraja: sin bandas, desde el margen superior. */
export function calcularCeldasBaraja(espec: EspecificacionCuadricula = CUADRICULA_CARTA): Rect[] {
  return calcularCeldas(espec, espec.margenSuperior);
}
