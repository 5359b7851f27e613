import { readFileSync } from 'node:fs';

describe('drawermap entry point', () => {
  it('loads .env before any module that reads the environment', () => {
    const source = readFileSync(new URL('../index.ts', import.meta.url), 'utf8');
    const imports = source.split('\n').filter((line) => line.startsWith('import '));

    expect(imports[0]).toBe("import 'dotenv/config';");
  });
});
