/*
 * Benchmark building and rendering element trees.
 *
 * Notes:
 * - This is a micro-benchmark. Results vary by machine and Node.js version.
 * - "build" constructs the tree with the tag constructors, "render" serializes
 *   a prebuilt tree, "build+render" does both in the hot loop.
 */

import { performance } from 'node:perf_hooks';

import {
  attr,
  classes,
  comment,
  renderToString,
  toDocument,
} from '../src/index.js';

import type { Document } from '../src/index.js';

import * as h from '../src/html.js';

type BenchmarkKind = 'build' | 'render' | 'build+render';

interface BenchmarkResult {
  kind: BenchmarkKind;
  scenario: string;
  iterations: number;
  totalMs: number;
  msPerOp: number;
  opsPerSec: number;
}

interface Scenario {
  name: string;
  build: () => Document;
}

interface BenchArgs {
  iterations: number;
  warmup: number;
  format: 'table' | 'md' | 'json';
  mode: 'all' | BenchmarkKind;
}

function parseArgs (argv: string[]): BenchArgs {
  const out: BenchArgs = {
    iterations: 20_000,
    warmup: 2_000,
    format: 'table',
    mode: 'all',
  };

  for (const arg of argv) {
    const m = /^--(iterations|warmup)=(\d+)$/.exec(arg);
    if (!m) continue;

    const value = Number.parseInt(m[2] ?? '', 10);
    if (!Number.isFinite(value) || value < 0) continue;

    if (m[1] === 'iterations') out.iterations = value;
    if (m[1] === 'warmup') out.warmup = value;
  }

  // keep things sane
  out.warmup = Math.max(0, Math.min(out.warmup, 200_000));
  out.iterations = Math.max(1, Math.min(out.iterations, 2_000_000));

  for (const arg of argv) {
    const value = /^--format=(table|md|json)$/.exec(arg)?.[1];
    if (value === 'table' || value === 'md' || value === 'json') out.format = value;
  }

  for (const arg of argv) {
    const value = /^--mode=(all|build|render|build\+render)$/.exec(arg)?.[1];
    if (value === 'all' || value === 'build' || value === 'render' || value === 'build+render') out.mode = value;
  }

  return out;
}

function measure (kind: BenchmarkKind, scenario: string, iterations: number, warmup: number, op: () => number): BenchmarkResult {
  let sink = 0;
  for (let i = 0; i < warmup; i++) {
    sink += op();
  }

  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    sink += op();
  }
  const end = performance.now();

  if (sink === Number.NEGATIVE_INFINITY) {
    // Prevent DCE in case of overly aggressive optimizations.
    console.log('sink', sink);
  }

  const totalMs = end - start;
  const msPerOp = totalMs / iterations;
  const opsPerSec = (iterations / totalMs) * 1000;

  return {
    kind,
    scenario,
    iterations,
    totalMs,
    msPerOp,
    opsPerSec,
  };
}

function main (): void {
  const args = parseArgs(process.argv.slice(2));

  if (process.execArgv.some((a) => a.startsWith('--inspect'))) {
    console.warn('Warning: Node inspector is enabled; benchmark results will be distorted.');
    console.warn('Tip: run in a normal terminal / unset NODE_OPTIONS.');
    console.warn('');
  }

  const scenarios: Scenario[] = [
    {
      name: 'small (hello page)',
      build: () => toDocument(h.html(
        h.head(h.title('Hello')),
        h.body(h.h1('Hello'), h.p('Hello ', h.em('world'), '!')),
      )),
    },
    {
      name: 'medium (form + script + comments)',
      build: () => toDocument(h.html(
        attr.set('lang', 'en'),
        h.head(
          h.meta(attr.set('charset', 'utf-8')),
          h.title('Sign up & <win>'),
          h.script('if (a < b && c > d) { run("</scrip"); }'),
        ),
        h.body(
          comment('form starts here -->'),
          h.form(
            attr.set('action', '/signup?ref="bench"'),
            h.label('Name', h.input(attr.set('name', 'name'), attr.yes('required'))),
            h.textarea('Tell us about <yourself> & more'),
            h.button(classes('btn'), classes('primary'), 'Send'),
          ),
        ),
      )),
    },
    {
      name: 'large (table with 200 rows)',
      build: () => toDocument(h.html(h.body(h.table(
        h.tbody(Array.from({ length: 200 }, (_, i) => h.tr(
          h.td(String(i)),
          h.td(`Row <${i}> & "${i * 2}"`),
          h.td(h.a(attr.set('href', `/rows/${i}?q="x"`), 'open')),
        ))),
      )))),
    },
  ];

  const results: BenchmarkResult[] = [];

  for (const scenario of scenarios) {
    const prebuilt = scenario.build();

    if (args.mode === 'all' || args.mode === 'build') {
      results.push(measure('build', scenario.name, args.iterations, args.warmup, () => scenario.build().root.children.length));
    }
    if (args.mode === 'all' || args.mode === 'render') {
      results.push(measure('render', scenario.name, args.iterations, args.warmup, () => renderToString(prebuilt).length));
    }
    if (args.mode === 'all' || args.mode === 'build+render') {
      results.push(measure('build+render', scenario.name, args.iterations, args.warmup, () => renderToString(scenario.build()).length));
    }
  }

  const rows = results.map((r) => ({
    kind: r.kind,
    scenario: r.scenario,
    iterations: r.iterations,
    totalMs: Number(r.totalMs.toFixed(2)),
    msPerOp: Number(r.msPerOp.toFixed(6)),
    opsPerSec: Number(r.opsPerSec.toFixed(0)),
  }));

  if (args.format === 'json') {
    console.log(JSON.stringify({
      node: process.version,
      params: {
        iterations: args.iterations,
        warmup: args.warmup,
        mode: args.mode,
      },
      results: rows,
    }));
    return;
  }

  if (args.format === 'md') {
    console.log('## elhtml benchmark');
    console.log('');
    console.log(`- Node: ${process.version}`);
    console.log(`- Params: iterations=${args.iterations}, warmup=${args.warmup}, mode=${args.mode}`);
    console.log('');
    console.log('| Kind | Scenario | Iterations | Total (ms) | ms/op | ops/sec |');
    console.log('| --- | --- | ---: | ---: | ---: | ---: |');

    for (const r of rows) {
      console.log(`| ${r.kind} | ${r.scenario} | ${r.iterations} | ${r.totalMs} | ${r.msPerOp} | ${r.opsPerSec} |`);
    }
    return;
  }

  console.log('Render benchmark');
  console.log(`Node: ${process.version}`);
  console.log(`iterations=${args.iterations} warmup=${args.warmup} mode=${args.mode}`);
  console.log('');

  console.table(rows);
}

main();
