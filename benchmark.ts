import { performance } from 'node:perf_hooks';
import { buildNew, compile, defineRecord, field, integer, list, string, unwrap } from './src/index.js';

// Compares resolving with a resolver compiled once against compiling the
// specs on every call, which is what buildNew does.

class Account {
  id = 0;
  owner = '';
  tags: string[] = [];
  limit = 0;
}

const accountFields = [
  field('id', integer()),
  field('owner', string(), { from: 'ownerName' }),
  field('tags', list(string()), { default: [] }),
  field('limit', integer(), { default: 500 }),
];

const inputs = Array.from({ length: 10_000 }, (_, i) => ({
  id: i,
  ownerName: `owner-${String(i)}`,
  tags: i % 2 === 0 ? ['retail'] : ['retail', 'priority'],
}));

function time(label: string, run: () => void): void {
  const start = performance.now();
  run();
  const elapsed = performance.now() - start;
  console.log(`${label}: ${elapsed.toFixed(2)}ms (${(elapsed / inputs.length).toFixed(4)}ms/record)`);
}

const resolver = unwrap(compile(accountFields));
const accounts = unwrap(defineRecord(Account, accountFields));

time('resolver compiled once', () => {
  for (const input of inputs) {
    unwrap(resolver(input));
  }
});

time('record definition compiled once', () => {
  for (const input of inputs) {
    unwrap(accounts.parse(input));
  }
});

time('buildNew per record', () => {
  for (const input of inputs) {
    unwrap(buildNew(accountFields, Account, input));
  }
});
