/**
 * CLI: genera el PDF de loteria a partir de una carpeta de imagenes.
 *
 * Ejemplo:
 *   npm run loteria -- cartas_originales -n 20 --baraja -s feria-2024
 */
import fs from 'node:fs/promises';
import path from 'node:path';
import { ErrorAplicacion } from '../src/compartido/errores/errorAplicacion';
import { generarLoteria } from '../src/modulos/modulo_loteria/application/usecases/generarLoteria';
import { AYUDA_CLI, parseArgs } from '../src/modulos/modulo_loteria/argumentosCli';
import { leerCarpetaImagenes } from '../src/modulos/modulo_loteria/infra/cargadorImagenes';

function linea(texto = '') {
  process.stdout.write(`${texto}\n`);
}

async function main() {
  const opciones = parseArgs(process.argv);
  if (opciones.ayuda) {
    linea(AYUDA_CLI);
    return;
  }

  linea('='.repeat(60));
  linea('GENERADOR DE TABLAS DE LOTERIA');
  linea('='.repeat(60));
  linea(`Carpeta de imagenes: ${opciones.carpeta}`);
  linea(`Tablas a generar:    ${opciones.cantidad}`);
  linea(`Titulo:              ${opciones.titulo}`);
  linea(`Fuente de etiquetas: ${opciones.tamanoFuente}px`);
  linea(`Incluir baraja:      ${opciones.incluirBaraja ? 'si' : 'no'}`);
  if (opciones.semilla) linea(`Semilla:             ${opciones.semilla}`);
  linea(`Archivo de salida:   ${opciones.salida}`);
  linea('='.repeat(60));

  const entradas = await leerCarpetaImagenes(opciones.carpeta);
  linea(`Se encontraron ${entradas.length} imagenes`);

  const resultado = await generarLoteria(
    entradas,
    {
      cantidadTablas: opciones.cantidad,
      titulo: opciones.titulo,
      tamanoFuenteEtiqueta: opciones.tamanoFuente,
      incluirBaraja: opciones.incluirBaraja,
      semilla: opciones.semilla
    },
    {
      alProgresar: (evento) => {
        const etiqueta = evento.tipo === 'tabla' ? `Tabla ${evento.numero}` : `Baraja pagina ${evento.numero}`;
        linea(`  [${evento.completadas}/${evento.total}] ${etiqueta}`);
      }
    }
  );

  await fs.mkdir(path.dirname(path.resolve(opciones.salida)), { recursive: true });
  await fs.writeFile(opciones.salida, resultado.pdfBytes);

  linea('='.repeat(60));
  linea(`PDF generado: ${path.resolve(opciones.salida)}`);
  linea(`Paginas: ${resultado.totalPaginas} (baraja: ${resultado.paginasBaraja}, tablas: ${resultado.tablas.length})`);
  for (const falla of resultado.fallas) {
    linea(`  Aviso: ${falla.idImagen ?? `${falla.tipoPagina} ${falla.numeroPagina}`}: ${falla.mensaje}`);
  }
  linea('='.repeat(60));
}

main().catch((error) => {
  const mensaje = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Error: ${mensaje}\n`);
  if (error instanceof ErrorAplicacion && error.codigo === 'CONFIGURACION_INVALIDA' && error.detalles) {
    process.stderr.write(`${JSON.stringify(error.detalles)}\n`);
  }
  process.exit(1);
});
