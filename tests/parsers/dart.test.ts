import { DartImportResolver } from '../../src/parsers/dart';

describe('DartImportResolver', () => {
  let resolver: DartImportResolver;

  beforeEach(() => {
    resolver = new DartImportResolver();
  });

  it('should collect import, export and part directives', () => {
    const content = [
      "import 'dart:async';",
      "import 'package:flutter/material.dart';",
      "import 'src/widget.dart' as w;",
      'export "../shared/model.dart";',
      "part 'state.g.dart';",
      "part of 'library.dart';",
      "// import 'commented.dart';",
    ].join('\n');

    expect(resolver.extractImports(content, '/proj/lib/main.dart')).toEqual([
      'dart:async',
      'package:flutter/material.dart',
      'src/widget.dart',
      '../shared/model.dart',
      'state.g.dart',
    ]);
  });

  it('should resolve relative URIs against the importing file', () => {
    const candidates = new Set(['/proj/lib/src/widget.dart', '/proj/shared/model.dart']);

    expect(resolver.resolve('src/widget.dart', '/proj/lib/main.dart', candidates)).toBe(
      '/proj/lib/src/widget.dart'
    );
    expect(resolver.resolve('../shared/model', '/proj/lib/main.dart', candidates)).toBe(
      '/proj/shared/model.dart'
    );
  });

  it('should treat dart: and package: URIs as external', () => {
    const candidates = new Set(['/proj/lib/async.dart']);

    expect(resolver.resolve('dart:async', '/proj/lib/main.dart', candidates)).toBeUndefined();
    expect(resolver.resolve('package:app/async.dart', '/proj/lib/main.dart', candidates)).toBeUndefined();
  });

  it('should recognise test files', () => {
    expect(resolver.isTestFile('/proj/test/widget_test.dart')).toBe(true);
    expect(resolver.isTestFile('/proj/lib/widget.dart')).toBe(false);
  });
});
