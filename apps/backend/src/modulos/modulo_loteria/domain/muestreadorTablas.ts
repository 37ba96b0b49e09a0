/**
 * Sorteo de tablas: cada tabla toma 16 imagenes distintas del pool completo,
 * de forma independiente a las demas tablas.
 */
import { muestrearSinReemplazo, type Aleatorio } from '../../../compartido/utilidades/aleatoriedad';
import type { Pool, Tabla } from '../shared/tiposLoteria';
import { IMAGENES_POR_TABLA } from './cuadricula';
import { ErrorConfiguracion, ErrorImagenesInsuficientes } from './erroresLoteria';

export function muestrearTablas(pool: Pool, cantidad: number, titulo: string, aleatorio: Aleatorio): Tabla[] {
  if (!Number.isInteger(cantidad) || cantidad <= 0) {
    throw new ErrorConfiguracion('La cantidad de tablas debe ser un entero mayor a 0', { cantidadTablas: cantidad });
  }
  if (pool.length < IMAGENES_POR_TABLA) {
    throw new ErrorImagenesInsuficientes(pool.length);
  }

  const tablas: Tabla[] = [];
  for (let folio = 1; folio <= cantidad; folio += 1) {
    tablas.push({
      folio,
      titulo,
      imagenes: muestrearSinReemplazo(pool, IMAGENES_POR_TABLA, aleatorio)
    });
  }
  return tablas;
}
