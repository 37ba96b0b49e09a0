/**
 * Argumentos de la CLI de generacion (`scripts/generar-loteria.ts`).
 */
import { ErrorConfiguracion } from './domain/erroresLoteria';

export type OpcionesCli = {
  carpeta: string;
  cantidad: number;
  titulo: string;
  tamanoFuente: number;
  incluirBaraja: boolean;
  semilla?: string;
  salida: string;
  ayuda: boolean;
};

export const AYUDA_CLI = [
  'Uso: generar-loteria [carpeta] [opciones]',
  '',
  '  carpeta                 Carpeta con imagenes .jpg/.jpeg/.png (default: cartas_originales)',
  '  -n, --cantidad <n>      Numero de tablas a generar (default: 10)',
  '  -t, --titulo <texto>    Titulo de las tablas (default: Lotería Mexicana)',
  '  -f, --fuente <px>       Tamano de fuente de las etiquetas (default: 32)',
  '      --baraja            Incluir paginas de baraja al inicio',
  '  -s, --semilla <valor>   Semilla para un sorteo reproducible',
  '  -o, --salida <ruta>     Archivo PDF de salida (default: output/loteria_completa.pdf)',
  '  -h, --help              Muestra esta ayuda'
].join('\n');

function parsearEntero(valor: string | undefined, bandera: string): number {
  const n = Number(valor);
  if (valor === undefined || valor.trim() === '' || !Number.isInteger(n)) {
    throw new ErrorConfiguracion(`${bandera} requiere un numero entero`, { valor: valor ?? null });
  }
  return n;
}

function requerirValor(valor: string | undefined, bandera: string): string {
  if (valor === undefined || valor.startsWith('-')) {
    throw new ErrorConfiguracion(`${bandera} requiere un valor`);
  }
  return valor;
}

export function parseArgs(argv: readonly string[]): OpcionesCli {
  const args = argv.slice(2);
  const opciones: OpcionesCli = {
    carpeta: 'cartas_originales',
    cantidad: 10,
    titulo: 'Lotería Mexicana',
    tamanoFuente: 32,
    incluirBaraja: false,
    salida: 'output/loteria_completa.pdf',
    ayuda: false
  };

  let carpetaIndicada = false;
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? '';
    const next = args[i + 1];
    if (arg === '-h' || arg === '--help') {
      opciones.ayuda = true;
      continue;
    }
    if (arg === '--baraja') {
      opciones.incluirBaraja = true;
      continue;
    }
    if (arg === '-n' || arg === '--cantidad') {
      opciones.cantidad = parsearEntero(next, arg);
      i += 1;
      continue;
    }
    if (arg === '-f' || arg === '--fuente') {
      opciones.tamanoFuente = parsearEntero(next, arg);
      i += 1;
      continue;
    }
    if (arg === '-t' || arg === '--titulo') {
      // El titulo puede ser vacio pero no omitirse.
      if (next === undefined) throw new ErrorConfiguracion(`${arg} requiere un valor`);
      opciones.titulo = next;
      i += 1;
      continue;
    }
    if (arg === '-s' || arg === '--semilla') {
      opciones.semilla = requerirValor(next, arg);
      i += 1;
      continue;
    }
    if (arg === '-o' || arg === '--salida') {
      opciones.salida = requerirValor(next, arg);
      i += 1;
      continue;
    }
    if (arg.startsWith('-')) {
      throw new ErrorConfiguracion(`Opcion desconocida: ${arg}`);
    }
    if (carpetaIndicada) {
      throw new ErrorConfiguracion(`Argumento inesperado: ${arg}`);
    }
    opciones.carpeta = arg;
    carpetaIndicada = true;
  }
  return opciones;
}
