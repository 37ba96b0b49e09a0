/**
 * Paginacion de la baraja: todas las imagenes del pool, una vez cada una,
 * en bloques consecutivos de 16 y en el mismo orden.
 */
import type { PaginaBaraja, Pool } from '../shared/tiposLoteria';
import { IMAGENES_POR_TABLA } from './cuadricula';

export function paginarBaraja(pool: Pool, porPagina = IMAGENES_POR_TABLA): PaginaBaraja[] {
  if (!Number.isInteger(porPagina) || porPagina < 1) {
    throw new RangeError(`Tamano de pagina invalido: ${porPagina}`);
  }
  const paginas: PaginaBaraja[] = [];
  for (let inicio = 0; inicio < pool.length; inicio += porPagina) {
    paginas.push({
      numero: paginas.length + 1,
      imagenes: pool.slice(inicio, inicio + porPagina)
    });
  }
  return paginas;
}
