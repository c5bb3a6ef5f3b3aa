import makeDebug from 'debug';
import { format } from 'util';

const debug = makeDebug('nodule:warning');

interface Expectation {
  pattern: RegExp;
  matched: boolean;
}

// innermost expectation last
const expectations: Expectation[] = [];

// raised by throwOnWarnings() for the duration of a test file
let strictness = 0;

function emit(text: string): void {
  if (strictness > 0) {
    throw new Error(`Unexpected warning in test suite: ${text}`);
  }
  console.warn(`nodule: ${text}`);
}

// A problem worth telling the user about that doesn't stop the current
// operation. Formatted like util.format.
export function warn(message: string, ...params: unknown[]): void {
  let text = format(message, ...params);
  debug(text);
  for (let i = expectations.length - 1; i >= 0; i--) {
    let expectation = expectations[i];
    if (expectation.pattern.test(text)) {
      expectation.matched = true;
      return;
    }
  }
  emit(text);
}

// Test helper: makes any warning in the surrounding describe() block fail the
// test that triggered it.
export function throwOnWarnings(): void {
  beforeAll(() => {
    strictness++;
  });
  afterAll(() => {
    strictness--;
  });
}

// Test helper: swallows warnings matching `pattern` while `fn` runs and tells
// whether any did.
export function expectWarning(pattern: RegExp, fn: () => void): boolean {
  let expectation: Expectation = { pattern, matched: false };
  expectations.push(expectation);
  try {
    fn();
  } finally {
    expectations.pop();
  }
  return expectation.matched;
}
