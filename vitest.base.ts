/**
 * vitest.base
 *
 * Opciones Vitest compartidas por las apps del monorepo.
 */
const reporter: Array<'text' | 'lcov' | 'json-summary'> = ['text', 'lcov', 'json-summary'];

export const baseVitestConfig = {
  clearMocks: true,
  restoreMocks: true,
  mockReset: true,
  // Las pruebas de extremo a extremo rasterizan paginas completas a 300 DPI.
  testTimeout: 60000,
  hookTimeout: 20000,
  coverage: {
    provider: 'v8' as const,
    reporter,
    all: true,
    exclude: ['**/dist/**', '**/node_modules/**', '**/tests/**', '**/*.d.ts']
  }
};
