/**
 * loteria.dominio.test
 *
 * Geometria de la cuadricula, paginacion de la baraja y sorteo de tablas.
 */
import { describe, expect, it } from 'vitest';
import { crearAleatorio } from '../src/compartido/utilidades/aleatoriedad';
import {
  calcularCeldasBaraja,
  calcularCeldasTabla,
  calcularTamanoCelda,
  CUADRICULA_CARTA
} from '../src/modulos/modulo_loteria/domain/cuadricula';
import { ErrorConfiguracion, ErrorImagenesInsuficientes } from '../src/modulos/modulo_loteria/domain/erroresLoteria';
import { muestrearTablas } from '../src/modulos/modulo_loteria/domain/muestreadorTablas';
import { paginarBaraja } from '../src/modulos/modulo_loteria/domain/paginadorBaraja';
import { crearPoolFalso } from './utils/imagenes';

describe('cuadricula', () => {
  it('deriva la celda de carta con division entera', () => {
    expect(calcularTamanoCelda(CUADRICULA_CARTA)).toEqual({ ancho: 551, alto: 693 });
  });

  it('ubica las celdas de tabla por filas debajo del titulo', () => {
    const celdas = calcularCeldasTabla();
    expect(celdas).toHaveLength(16);
    expect(celdas[0]).toEqual({ x: 150, y: 300, ancho: 551, alto: 693 });
    expect(celdas[1]).toEqual({ x: 716, y: 300, ancho: 551, alto: 693 });
    expect(celdas[4]).toEqual({ x: 150, y: 1008, ancho: 551, alto: 693 });
    expect(celdas[15]).toEqual({ x: 1848, y: 2424, ancho: 551, alto: 693 });
  });

  it('ninguna celda de tabla invade margenes ni la banda de folio', () => {
    const limiteX = CUADRICULA_CARTA.anchoPagina - CUADRICULA_CARTA.margenDerecho;
    const limiteY = CUADRICULA_CARTA.altoPagina - CUADRICULA_CARTA.margenInferior - CUADRICULA_CARTA.altoFolio;
    for (const celda of calcularCeldasTabla()) {
      expect(celda.x + celda.ancho).toBeLessThanOrEqual(limiteX);
      expect(celda.y + celda.alto).toBeLessThanOrEqual(limiteY);
    }
  });

  it('la baraja comparte tamano de celda y arranca en el margen superior', () => {
    const celdas = calcularCeldasBaraja();
    expect(celdas[0]).toEqual({ x: 150, y: 100, ancho: 551, alto: 693 });
    expect(celdas[15]).toEqual({ x: 1848, y: 2224, ancho: 551, alto: 693 });
  });

  it('rechaza layouts sin espacio para celdas', () => {
    expect(() => calcularTamanoCelda({ ...CUADRICULA_CARTA, separacion: 1000 })).toThrow(/Layout invalido/);
  });
});

describe('paginarBaraja', () => {
  it('divide 20 imagenes en 16 + 4 conservando el orden', () => {
    const pool = crearPoolFalso(20);
    const paginas = paginarBaraja(pool);

    expect(paginas.map((pagina) => pagina.numero)).toEqual([1, 2]);
    expect(paginas.map((pagina) => pagina.imagenes.length)).toEqual([16, 4]);
    expect(paginas.flatMap((pagina) => pagina.imagenes)).toEqual(pool);
  });

  it('16 imagenes caben en una pagina y un pool vacio no tiene paginas', () => {
    expect(paginarBaraja(crearPoolFalso(16))).toHaveLength(1);
    expect(paginarBaraja([])).toEqual([]);
  });

  it('rechaza tamanos de pagina invalidos', () => {
    expect(() => paginarBaraja(crearPoolFalso(4), 0)).toThrow(RangeError);
  });
});

describe('muestrearTablas', () => {
  it('genera tablas con folios consecutivos y 16 imagenes distintas del pool', () => {
    const pool = crearPoolFalso(30);
    const tablas = muestrearTablas(pool, 5, 'Feria', crearAleatorio(5));

    expect(tablas.map((tabla) => tabla.folio)).toEqual([1, 2, 3, 4, 5]);
    for (const tabla of tablas) {
      expect(tabla.titulo).toBe('Feria');
      expect(tabla.imagenes).toHaveLength(16);
      expect(new Set(tabla.imagenes.map((imagen) => imagen.id)).size).toBe(16);
      for (const imagen of tabla.imagenes) expect(pool).toContain(imagen);
    }
  });

  it('con exactamente 16 imagenes cada tabla usa todas una vez', () => {
    const pool = crearPoolFalso(16);
    const [tabla] = muestrearTablas(pool, 1, 'Feria', crearAleatorio(1));
    const ids = (tabla?.imagenes ?? []).map((imagen) => imagen.id).sort();
    expect(ids).toEqual(pool.map((imagen) => imagen.id).sort());
  });

  it('es reproducible con la misma semilla', () => {
    const pool = crearPoolFalso(25);
    const ids = (semilla: string) =>
      muestrearTablas(pool, 3, '', crearAleatorio(semilla)).map((tabla) => tabla.imagenes.map((imagen) => imagen.id));
    expect(ids('abc')).toEqual(ids('abc'));
  });

  it('rechaza cantidades no positivas o no enteras', () => {
    const pool = crearPoolFalso(16);
    expect(() => muestrearTablas(pool, 0, '', Math.random)).toThrow(ErrorConfiguracion);
    expect(() => muestrearTablas(pool, -2, '', Math.random)).toThrow(ErrorConfiguracion);
    expect(() => muestrearTablas(pool, 1.5, '', Math.random)).toThrow(ErrorConfiguracion);
  });

  it('rechaza pools con menos de 16 imagenes', () => {
    try {
      muestrearTablas(crearPoolFalso(15), 1, '', Math.random);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ErrorImagenesInsuficientes)) throw error;
      expect(error.codigo).toBe('IMAGENES_INSUFICIENTES');
      expect(error.estadoHttp).toBe(422);
      expect(error.disponibles).toBe(15);
      expect(error.message).toBe('Se necesitan al menos 16 imágenes, pero solo se encontraron 15.');
    }
  });
});
