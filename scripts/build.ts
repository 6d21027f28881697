/*
 * Script to build the browser bundles.
 *
 * The Node.js build (ESM + .d.ts) is done by `tsc`; this script adds an IIFE
 * bundle exposing the library as `elhtml` on the global object.
 *
 * Hint: Don't use top level await here since this will cause the debugger to
 * hang on exit.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { build, BuildOptions } from 'esbuild';

/**
 * Defines if the the build should be a production build.
 */
const prod = process.env.NODE_ENV === 'production';

/**
 * Base dir of the project.
 */
const baseDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..');

const pkg = JSON.parse(fs.readFileSync(path.join(baseDir, 'package.json'), 'utf8')) as { version: string };

let building = false;
let buildCounter = 0;

/**
 * Common build options.
 */
const buildOptions: BuildOptions = {
  absWorkingDir: baseDir,
  entryPoints: [
    './src/index.ts',
  ],
  bundle: true,
  treeShaking: true,
  format: 'iife',
  platform: 'browser',
  globalName: 'elhtml',
  target: 'es2022',
  sourcemap: !prod,
  metafile: true,
  banner: {
    js: `/* elhtml ${pkg.version} */`,
  },
};

/**
 * Do the build.
 */
async function doBuild (): Promise<boolean> {
  building = true;

  process.stdout.write(`Doing ${prod ? 'production' : 'development'} build #${++buildCounter} ... `);
  const startTime = Date.now();

  let success = true;

  try {
    const [ browserResult, browserMinResult ] = await Promise.all([
      build({
        ...buildOptions,
        outfile: './dist/browser/elhtml.js',
      }),
      build({
        ...buildOptions,
        outfile: './dist/browser/elhtml.min.js',
        minify: true,
      }),
    ]);

    // write results metafiles
    await Promise.all([
      fs.promises.writeFile(path.join(baseDir, 'dist', 'metaBrowser.json'), JSON.stringify(browserResult.metafile, undefined, 2)),
      fs.promises.writeFile(path.join(baseDir, 'dist', 'metaBrowserMin.json'), JSON.stringify(browserMinResult.metafile, undefined, 2)),
    ]);
  } catch (err) {
    success = false;
    console.error(err);
  }

  const duration = Date.now() - startTime;
  process.stdout.write(`Build ${success ? 'done' : 'failed'} in ${(duration / 1000).toFixed(2)}s\n`);

  building = false;

  return success;
}

/**
 * Main function to init the process
 */
async function main (): Promise<void> {

  // run a normal build
  let success = await doBuild();

  // Watch for changes?
  if (process.argv.includes('--watch')) {
    let debounce: NodeJS.Timeout | null = null;

    console.log('Watching for src changes ...');

    const watcher = fs.watch(path.join(baseDir, 'src'), { recursive: true }, () => {
      if (debounce) {
        clearTimeout(debounce);
      }

      // run build debounced
      debounce = setTimeout(() => {
        debounce = null;

        // do nothing if already building
        if (building) return;

        void doBuild().then((ok) => {
          success = ok;
        });
      }, 2000);
    });

    process.on('SIGINT', () => {
      console.log('Stop watching for changes');
      watcher.close();
      process.exit(success ? 0 : 1);
    });

    return;
  }

  // exit with proper code
  process.exit(success ? 0 : 1);
}

void main();
