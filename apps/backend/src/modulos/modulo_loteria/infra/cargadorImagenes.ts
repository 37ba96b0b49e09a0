/**
 * Lectura de una carpeta de imagenes para la CLI.
 *
 * Solo archivos .jpg/.jpeg/.png (sin distinguir mayusculas), en orden
 * alfabetico por nombre de archivo. La leyenda es el nombre sin extension.
 */
import fs from 'node:fs/promises';
import path from 'node:path';
import { obtenerExtension, obtenerNombreBase } from '../../../compartido/utilidades/texto';
import { ErrorConfiguracion } from '../domain/erroresLoteria';
import type { EntradaImagen } from '../shared/tiposLoteria';

export const EXTENSIONES_ADMITIDAS = ['.jpg', '.jpeg', '.png'] as const;

export function esExtensionAdmitida(nombreArchivo: string): boolean {
  const extension = obtenerExtension(nombreArchivo);
  return EXTENSIONES_ADMITIDAS.some((admitida) => admitida === extension);
}

export async function leerCarpetaImagenes(carpeta: string): Promise<EntradaImagen[]> {
  let archivos: string[];
  try {
    const entradas = await fs.readdir(carpeta, { withFileTypes: true });
    archivos = entradas
      .filter((entrada) => entrada.isFile() && esExtensionAdmitida(entrada.name))
      .map((entrada) => entrada.name)
      .sort();
  } catch (error) {
    throw new ErrorConfiguracion(`No se pudo leer la carpeta '${carpeta}'. Creala y coloca ahi las imagenes.`, {
      causa: error instanceof Error ? error.message : String(error)
    });
  }

  const imagenes: EntradaImagen[] = [];
  for (const archivo of archivos) {
    imagenes.push({
      nombre: obtenerNombreBase(archivo),
      contenido: await fs.readFile(path.join(carpeta, archivo))
    });
  }
  return imagenes;
}
