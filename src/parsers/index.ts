import { ImportResolverRegistry } from './base';
import { CImportResolver } from './c';
import { DartImportResolver } from './dart';
import { JavaScriptImportResolver } from './javascript';
import { PythonImportResolver } from './python';

export * from './base';
export { JavaScriptImportResolver, isRelativeSpecifier } from './javascript';
export { PythonImportResolver } from './python';
export { DartImportResolver } from './dart';
export { CImportResolver } from './c';
export { createTestFileClassifier, isInTestDirectory } from './test-classifier';

export function createDefaultRegistry(): ImportResolverRegistry {
  return new ImportResolverRegistry()
    .register(new JavaScriptImportResolver())
    .register(new PythonImportResolver())
    .register(new DartImportResolver())
    .register(new CImportResolver());
}
