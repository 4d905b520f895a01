import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

const PUBLIC_ENV = ['REACT_APP_STORAGE_BACKEND', 'REACT_APP_DATABASE_NAME', 'REACT_APP_REPORT_ROW_LIMIT'];

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), 'REACT_APP_');

  return {
    root: 'UI',
    plugins: [react()],
    define: Object.fromEntries(
      PUBLIC_ENV.map((key) => [`process.env.${key}`, JSON.stringify(env[key] ?? '')])
    ),
  };
});
