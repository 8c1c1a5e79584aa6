import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    validation: 'src/validation.ts',
    'security/index': 'src/security/index.ts',
    'observability/index': 'src/observability/index.ts',
    'runtime/crypto': 'src/runtime/crypto.ts',
    'runtime/base64': 'src/runtime/base64.ts',
    'runtime/env': 'src/runtime/env.ts',
  },
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  external: ['ajv'],
});
