/**
 * Error estandar para fallas controladas del generador.
 *
 * Se usa igual desde la API (envelope `{ error: { codigo, mensaje, detalles? } }`)
 * que desde la CLI (codigo + mensaje en consola).
 *
 * Notas:
 * - `codigo` debe ser estable (orientado a maquina).
 * - `detalles` se usa principalmente para errores de validacion (p. ej. `zod.flatten()`).
 */
export class ErrorAplicacion extends Error {
  codigo: string;
  estadoHttp: number;
  detalles?: unknown;

  constructor(codigo: string, mensaje: string, estadoHttp = 400, detalles?: unknown) {
    super(mensaje);
    this.name = new.target.name;
    this.codigo = codigo;
    this.estadoHttp = estadoHttp;
    this.detalles = detalles;
  }
}
