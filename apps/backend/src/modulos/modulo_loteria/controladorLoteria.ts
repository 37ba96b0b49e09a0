/**
 * Controlador de generacion de loterias por HTTP.
 *
 * Recibe las imagenes en base64, delega en `generarLoteria` y responde el
 * PDF como descarga. Si el cliente cierra la conexion, la generacion se
 * cancela en el siguiente limite de pagina.
 */
import type { Request, Response } from 'express';
import { normalizarParaNombreArchivo, obtenerExtension, obtenerNombreBase } from '../../compartido/utilidades/texto';
import { generarLoteria } from './application/usecases/generarLoteria';
import { esExtensionAdmitida } from './infra/cargadorImagenes';
import type { EntradaImagen } from './shared/tiposLoteria';
import { esquemaGenerarLoteria, type PayloadGenerarLoteria } from './validacionesLoteria';

/** Sin extension se toma el nombre tal cual; con extension solo se aceptan jpg/jpeg/png. */
function decodificarImagenes(imagenes: PayloadGenerarLoteria['imagenes']): EntradaImagen[] {
  const entradas: EntradaImagen[] = [];
  for (const imagen of imagenes) {
    const conExtension = obtenerExtension(imagen.nombre) !== '';
    if (conExtension && !esExtensionAdmitida(imagen.nombre)) continue;
    entradas.push({
      nombre: conExtension ? obtenerNombreBase(imagen.nombre) : imagen.nombre,
      contenido: Buffer.from(imagen.contenidoBase64, 'base64')
    });
  }
  return entradas;
}

export function construirNombreDescarga(titulo: string): string {
  return `${normalizarParaNombreArchivo(titulo, { maxLen: 60 }) || 'loteria'}.pdf`;
}

export async function generarLoteriaPdf(req: Request, res: Response) {
  const payload = esquemaGenerarLoteria.parse(req.body);
  const cancelacion = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) cancelacion.abort();
  });

  const resultado = await generarLoteria(
    decodificarImagenes(payload.imagenes),
    {
      cantidadTablas: payload.cantidadTablas,
      titulo: payload.titulo,
      tamanoFuenteEtiqueta: payload.tamanoFuenteEtiqueta,
      incluirBaraja: payload.incluirBaraja,
      prefijoFolio: payload.prefijoFolio,
      semilla: payload.semilla
    },
    { signal: cancelacion.signal }
  );

  res.setHeader('Content-Type', 'application/pdf');
  res.setHeader('Content-Disposition', `attachment; filename="${construirNombreDescarga(payload.titulo)}"`);
  res.setHeader('x-loteria-paginas', String(resultado.totalPaginas));
  res.setHeader('x-loteria-fallas', String(resultado.fallas.length));
  res.send(resultado.pdfBytes);
}
