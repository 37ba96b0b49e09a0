/**
 * Errores normalizados del generador de loterias.
 *
 * Las fallas de una imagen individual no se lanzan: se registran como
 * `FallaRecurso` y la generacion continua.
 */
import { ErrorAplicacion } from '../../../compartido/errores/errorAplicacion';
import { IMAGENES_POR_TABLA } from './cuadricula';

export class ErrorConfiguracion extends ErrorAplicacion {
  constructor(mensaje: string, detalles?: unknown, codigo = 'CONFIGURACION_INVALIDA') {
    super(codigo, mensaje, 400, detalles);
  }
}

export class ErrorImagenesInsuficientes extends ErrorAplicacion {
  readonly disponibles: number;

  constructor(disponibles: number, requeridas = IMAGENES_POR_TABLA) {
    super(
      'IMAGENES_INSUFICIENTES',
      `Se necesitan al menos ${requeridas} imágenes, pero solo se encontraron ${disponibles}.`,
      422,
      { disponibles, requeridas }
    );
    this.disponibles = disponibles;
  }
}

export class ErrorEnsamblado extends ErrorAplicacion {
  constructor(mensaje: string, causa?: unknown) {
    super(
      'ENSAMBLADO_FALLIDO',
      mensaje,
      500,
      causa === undefined ? undefined : { causa: causa instanceof Error ? causa.message : String(causa) }
    );
  }
}

export class ErrorGeneracionCancelada extends ErrorAplicacion {
  constructor(paginasEmitidas: number) {
    super('GENERACION_CANCELADA', 'La generacion se cancelo antes de terminar', 499, { paginasEmitidas });
  }
}
