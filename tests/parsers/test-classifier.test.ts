import { createDefaultRegistry } from '../../src/parsers';
import { createTestFileClassifier, isInTestDirectory } from '../../src/parsers/test-classifier';

describe('createTestFileClassifier', () => {
  const classifier = createTestFileClassifier(createDefaultRegistry());

  it('should use the language naming rules', () => {
    expect(classifier.isTestFile('/proj/src/app_test.dart')).toBe(true);
    expect(classifier.isTestFile('/proj/src/app.spec.ts')).toBe(true);
    expect(classifier.isTestFile('/proj/src/app.dart')).toBe(false);
  });

  it('should flag any file under a test directory', () => {
    expect(classifier.isTestFile('/proj/tests/helpers.py')).toBe(true);
    expect(classifier.isTestFile('/proj/spec/data.json')).toBe(true);
  });

  it('should not match directories that only start with test', () => {
    expect(classifier.isTestFile('/proj/testing/app.c')).toBe(false);
  });
});

describe('isInTestDirectory', () => {
  it('should check every ancestor directory', () => {
    expect(isInTestDirectory('/proj/test/unit/a.go')).toBe(true);
    expect(isInTestDirectory('/proj/src/test.go')).toBe(false);
  });
});
