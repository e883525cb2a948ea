/**
 * Query Assembler Performance Benchmarks
 *
 * Measures the cost of composing and rendering SELECT statements.
 * Run with: npx tsx benchmarks/query-assembler.bench.ts
 */

import { performance } from 'perf_hooks';

import { CriteriaBuilder, MetadataResolver, defineEntity, metadataResolver } from '@criteria-sql/core';

const colors = {
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  reset: '\x1b[0m',
  bold: '\x1b[1m',
};

const Base = defineEntity('Base', { fields: { id: {}, createdAt: {} } });

const Customer = defineEntity('Customer', {
  extends: Base,
  fields: { email: {}, lastName: {}, region: {} },
});

const Invoice = defineEntity('Invoice', {
  extends: Base,
  fields: { customerId: {}, status: {}, amountDue: { column: 'amount' } },
});

const InvoiceLine = defineEntity('InvoiceLine', {
  extends: Base,
  fields: { invoiceId: {}, sku: {}, quantity: {} },
});

interface BenchmarkResult {
  name: string;
  iterations: number;
  totalMs: number;
  avgMs: number;
  opsPerSec: number;
}

function benchmark(name: string, fn: () => void, iterations = 10000): BenchmarkResult {
  // Warmup
  for (let i = 0; i < 100; i++) fn();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    fn();
  }
  const totalMs = performance.now() - start;
  const avgMs = totalMs / iterations;
  const opsPerSec = Math.round(1000 / avgMs);

  return { name, iterations, totalMs, avgMs, opsPerSec };
}

function printResult(result: BenchmarkResult) {
  const opsColor =
    result.opsPerSec > 100000
      ? colors.green
      : result.opsPerSec > 10000
        ? colors.yellow
        : colors.reset;
  console.log(
    `  ${result.name.padEnd(45)} ${opsColor}${result.opsPerSec.toLocaleString().padStart(10)} ops/sec${colors.reset}  (${result.avgMs.toFixed(4)}ms avg)`,
  );
}

function printSection(title: string) {
  console.log(`\n${colors.bold}${colors.blue}▶ ${title}${colors.reset}`);
}

function runBenchmarks() {
  console.log(`${colors.bold}criteria-sql query assembler benchmarks${colors.reset}`);

  printSection('Simple Queries');

  printResult(
    benchmark('SELECT m.* FROM table', () => {
      const cb = new CriteriaBuilder();
      const customer = cb.declareFrom(Customer);
      cb.query().select(cb.select(customer)).render();
    }),
  );

  printResult(
    benchmark('SELECT with WHERE', () => {
      const cb = new CriteriaBuilder();
      const customer = cb.declareFrom(Customer);
      cb.query()
        .select(cb.select(customer))
        .where(cb.equals(customer.column('region'), 'EU'))
        .render();
    }),
  );

  printSection('Complex Queries');

  printResult(
    benchmark('Two JOINs + nested AND/OR + paging', () => {
      const cb = new CriteriaBuilder();
      const invoice = cb.declareFrom(Invoice);
      const customer = cb.declareJoin(Customer, invoice.column('customerId'), 'id');
      const line = cb.declareJoin(InvoiceLine, invoice.column('id'), 'invoiceId', 'LEFT');
      cb.query()
        .select(cb.multiSelect(invoice.column('id'), customer.column('email'), line.column('sku')))
        .where(
          cb.and(
            cb.in(invoice.column('status'), ['open', 'overdue']),
            cb.or(cb.greaterThan(invoice.column('amountDue'), 100), cb.isNull(line.column('quantity'))),
          ),
        )
        .orderBy(cb.desc(invoice.column('createdAt')))
        .limit(50)
        .offset(100)
        .render();
    }),
  );

  printResult(
    benchmark('COUNT + GROUP BY', () => {
      const cb = new CriteriaBuilder({ dialect: 'mysql' });
      const invoice = cb.declareFrom(Invoice);
      cb.query()
        .select(cb.multiSelect(invoice.column('customerId'), invoice.count('id', 'invoices')))
        .groupBy(invoice.column('customerId'))
        .render();
    }),
  );

  printSection('Name Resolution');

  printResult(
    benchmark('resolveColumn (shared, warm cache)', () => {
      metadataResolver.resolveColumn(Invoice, 'amountDue');
    }),
  );

  printResult(
    benchmark('resolveColumn (cold resolver)', () => {
      new MetadataResolver().resolveColumn(Invoice, 'createdAt');
    }),
  );

  console.log('\nShared resolver:', metadataResolver.getStatistics());
}

runBenchmarks();
