/**
 * Validaciones de la generacion de loterias.
 *
 * `esquemaParametrosGeneracion` es el contrato del motor (CLI y API);
 * `esquemaGenerarLoteria` es el payload HTTP con las imagenes en base64.
 */
import { z } from 'zod';
import { normalizarEspacios } from '../../compartido/utilidades/texto';
import { configuracion } from '../../configuracion';

export const esquemaTitulo = z.string().max(50).transform(normalizarEspacios);
export const esquemaTamanoFuenteEtiqueta = z.number().int().min(16).max(64);
const esquemaSemilla = z.union([z.number().int(), z.string().trim().min(1).max(120)]);

export const esquemaParametrosGeneracion = z
  .object({
    cantidadTablas: z.number().int().positive().max(configuracion.maxTablas),
    titulo: esquemaTitulo,
    tamanoFuenteEtiqueta: esquemaTamanoFuenteEtiqueta,
    incluirBaraja: z.boolean(),
    prefijoFolio: z.string().trim().min(1).max(20).optional(),
    semilla: esquemaSemilla.optional()
  })
  .strict();

const esquemaImagenPayload = z
  .object({
    // Sin trim: el nombre es la leyenda tal como llega.
    nombre: z
      .string()
      .max(200)
      .refine((valor) => valor.trim().length > 0, 'El nombre no puede estar vacio'),
    contenidoBase64: z.string().min(1)
  })
  .strict();

export const esquemaGenerarLoteria = z
  .object({
    imagenes: z.array(esquemaImagenPayload).min(1).max(configuracion.maxImagenes),
    cantidadTablas: z.number().int().positive().max(configuracion.maxTablas).default(10),
    titulo: esquemaTitulo.default('Lotería Mexicana'),
    tamanoFuenteEtiqueta: esquemaTamanoFuenteEtiqueta.default(40),
    incluirBaraja: z.boolean().default(true),
    prefijoFolio: z.string().trim().min(1).max(20).optional(),
    semilla: esquemaSemilla.optional()
  })
  .strict();

export type PayloadGenerarLoteria = z.infer<typeof esquemaGenerarLoteria>;
