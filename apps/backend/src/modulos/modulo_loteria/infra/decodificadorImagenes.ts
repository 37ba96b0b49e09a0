/**
 * Decodificacion del pool: valida que cada entrada sea una imagen legible y
 * registra sus dimensiones. Las entradas ilegibles se omiten con su falla.
 */
import sharp from 'sharp';
import { log } from '../../../infraestructura/logging/logger';
import type { EntradaImagen, FallaRecurso, ImagenLoteria } from '../shared/tiposLoteria';

export interface PoolCargado {
  pool: ImagenLoteria[];
  fallas: FallaRecurso[];
}

async function decodificar(entrada: EntradaImagen): Promise<ImagenLoteria> {
  const metadata = await sharp(entrada.contenido).metadata();
  const { width, height } = metadata;
  if (!width || !height) {
    throw new Error('Imagen sin dimensiones');
  }
  // Con orientacion EXIF 5-8 la imagen se dibuja rotada 90 grados.
  const rotada = (metadata.orientation ?? 1) >= 5;
  return {
    id: entrada.nombre,
    contenido: entrada.contenido,
    ancho: rotada ? height : width,
    alto: rotada ? width : height
  };
}

/**
 * Conserva el orden de entrada. El nombre solo da la leyenda: `sol.jpg` y
 * `sol.png` son dos imagenes distintas con la misma leyenda.
 */
export async function cargarPool(entradas: readonly EntradaImagen[]): Promise<PoolCargado> {
  const pool: ImagenLoteria[] = [];
  const fallas: FallaRecurso[] = [];
  for (const entrada of entradas) {
    try {
      pool.push(await decodificar(entrada));
    } catch (error) {
      const mensaje = error instanceof Error ? error.message : String(error);
      log('warn', 'Imagen omitida del pool', { imagen: entrada.nombre, motivo: mensaje });
      fallas.push({ codigo: 'IMAGEN_NO_DECODIFICABLE', mensaje, idImagen: entrada.nombre });
    }
  }
  return { pool, fallas };
}
