import { Readable } from 'node:stream';
import { TolerantRecordReader, readNumericCsv } from '../src';

console.log('=== Numeric CSV Example ===\n');

// Exported sensor log: a comment banner, quoted labels, a trailing comma
const sampleCsv = `# exported by logger v2

"time","temp","pressure",
0,21.5,101.3
1,21.7,101.2,
2,21.6,101.4
`;

const result = await readNumericCsv(sampleCsv, {
  commentPrefix: '#',
  allowTrailingDelimiter: true,
});

if (result.ok) {
  const { heading, matrix } = result.data;
  console.log(`Loaded ${matrix.rows} rows x ${matrix.cols} columns`);
  console.log(`Columns: ${heading?.join(', ')}`);
  const temps = matrix.column(1);
  if (temps) {
    console.log(`Mean temp: ${temps.reduce((a, b) => a + b, 0) / matrix.rows}\n`);
  }
} else {
  console.error(result.error.format());
}

// Row-at-a-time reading from a stream, stopping at the first bad value
console.log('Streaming rows:');
const reader = new TolerantRecordReader(Readable.from(['1;2\n', '3;oops\n']), {
  fieldDelimiter: ';',
  skipHeading: true,
});

while (true) {
  const row = await reader.read();
  if (!row.ok) {
    console.error(row.error.format());
    break;
  }
  if (row.data === null) break;
  console.log(`  ${Array.from(row.data).join(', ')}`);
}
