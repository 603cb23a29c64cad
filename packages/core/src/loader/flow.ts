/**
 * Flow loader for parsing and validating flow YAML files
 */

import { stringify as stringifyYaml } from 'yaml';
import {
  createFlowConfig,
  formatViolations,
  SchemaValidationError,
  type FlowConfig,
} from 'flowdoc-schemas';
import { debug } from '../verbose.js';
import {
  decodeDocument,
  extractSection,
  readDocumentFile,
  type DocumentKind,
} from './document.js';
import { SemanticValidationError } from './errors.js';

const FLOW_DOCUMENT: DocumentKind = { section: 'flow', label: 'Flow' };

/**
 * Validate the `flow` section. The section is the step sequence itself.
 */
function validateFlow(section: unknown, source: string): FlowConfig {
  try {
    return createFlowConfig({ flow: section });
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      throw new SemanticValidationError(
        `Flow validation failed in ${source}:\n${formatViolations(error.violations)}`,
        source,
        error.violations,
        error
      );
    }
    throw new SemanticValidationError(
      `Error validating flow in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      source,
      [],
      error
    );
  }
}

/**
 * Load and validate a flow from a YAML file
 *
 * @param filePath - Path to the flow YAML file
 * @returns Validated, read-only flow configuration
 * @throws {FileAccessError} If the file is missing, not a file or unreadable
 * @throws {StructuralError} If the YAML is malformed, empty or lacks a `flow` section
 * @throws {SemanticValidationError} If the steps fail schema validation
 *
 * @example
 * ```typescript
 * import { loadFlow, SemanticValidationError } from 'flowdoc-core';
 *
 * try {
 *   const config = loadFlow('./flows/support.yaml');
 *   console.log(`Loaded ${config.flow.length} steps`);
 * } catch (error) {
 *   if (error instanceof SemanticValidationError) {
 *     console.error(error.violations);
 *   }
 * }
 * ```
 */
export function loadFlow(filePath: string): FlowConfig {
  debug(`Loading flow from ${filePath}`);

  const content = decodeDocument(
    readDocumentFile(filePath, FLOW_DOCUMENT),
    filePath
  );
  const config = validateFlow(
    extractSection(content, filePath, FLOW_DOCUMENT),
    filePath
  );

  debug(`Loaded flow with ${config.flow.length} steps from ${filePath}`);
  return config;
}

/**
 * Load and validate a flow from a YAML string
 *
 * @param yamlContent - YAML string containing a `flow` section
 * @param source - Label used in error messages
 */
export function loadFlowFromString(
  yamlContent: string,
  source = '<string>'
): FlowConfig {
  return validateFlow(
    extractSection(yamlContent, source, FLOW_DOCUMENT),
    source
  );
}

/**
 * Serialize a flow back to the document format. Absent optional fields
 * are omitted.
 */
export function serializeFlow(config: FlowConfig): string {
  return stringifyYaml(
    { flow: config.flow },
    { indent: 2, lineWidth: 80, minContentWidth: 20 }
  );
}
