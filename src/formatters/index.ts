import { OutputFormatName } from '../utils/config';
import { DotFormatter } from './dot';
import { JsonFormatter } from './json';
import { MermaidFormatter } from './mermaid';
import { Formatter } from './types';

export * from './types';
export { DotFormatter } from './dot';
export { MermaidFormatter } from './mermaid';
export { JsonFormatter, JsonGraph, JsonNode, JsonEdge, NodeAttribute } from './json';

export const OUTPUT_FORMATS: readonly OutputFormatName[] = ['dot', 'mermaid', 'json'];

export function isOutputFormat(value: string): value is OutputFormatName {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function createFormatter(format: string): Formatter {
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown output format: ${format} (expected one of ${OUTPUT_FORMATS.join(', ')})`);
  }
  switch (format) {
    case 'dot':
      return new DotFormatter();
    case 'mermaid':
      return new MermaidFormatter();
    case 'json':
      return new JsonFormatter();
  }
}
