/**
 * Workflow loader for parsing and validating workflow YAML files
 */

import { stringify as stringifyYaml } from 'yaml';
import {
  createWorkflowConfig,
  formatViolations,
  SchemaValidationError,
  toViolations,
  type WorkflowConfig,
} from 'flowdoc-schemas';
import { debug } from '../verbose.js';
import {
  decodeDocument,
  extractSection,
  readDocumentFile,
  type DocumentKind,
} from './document.js';
import { SemanticValidationError } from './errors.js';

const WORKFLOW_DOCUMENT: DocumentKind = {
  section: 'workflow',
  label: 'Workflow',
};

/**
 * Validate the `workflow` section. The section is the workflow record,
 * so violation paths are reported under `workflow.`.
 */
function validateWorkflow(section: unknown, source: string): WorkflowConfig {
  try {
    return createWorkflowConfig(section);
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      const violations = toViolations(
        error.validationErrors,
        WORKFLOW_DOCUMENT.section
      );
      throw new SemanticValidationError(
        `Workflow validation failed in ${source}:\n${formatViolations(violations)}`,
        source,
        violations,
        error
      );
    }
    throw new SemanticValidationError(
      `Error validating workflow in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      source,
      [],
      error
    );
  }
}

/**
 * Load and validate a workflow from a YAML file
 *
 * @param filePath - Path to the workflow YAML file
 * @returns Validated, read-only workflow configuration
 * @throws {FileAccessError} If the file is missing, not a file or unreadable
 * @throws {StructuralError} If the YAML is malformed, empty or lacks a `workflow` section
 * @throws {SemanticValidationError} If the workflow fails schema validation
 */
export function loadWorkflow(filePath: string): WorkflowConfig {
  debug(`Loading workflow from ${filePath}`);

  const content = decodeDocument(
    readDocumentFile(filePath, WORKFLOW_DOCUMENT),
    filePath
  );
  const workflow = validateWorkflow(
    extractSection(content, filePath, WORKFLOW_DOCUMENT),
    filePath
  );

  debug(
    `Loaded workflow "${workflow.name}" with ${workflow.steps.length} steps from ${filePath}`
  );
  return workflow;
}

/**
 * Load and validate a workflow from a YAML string
 *
 * @example
 * ```typescript
 * const workflow = loadWorkflowFromString(`
 * workflow:
 *   name: demo
 *   agents:
 *     greeter: {instructions: "Be nice."}
 *   steps:
 *     - {name: welcome, agent: greeter, ask: "Say hi"}
 * `);
 * ```
 */
export function loadWorkflowFromString(
  yamlContent: string,
  source = '<string>'
): WorkflowConfig {
  return validateWorkflow(
    extractSection(yamlContent, source, WORKFLOW_DOCUMENT),
    source
  );
}

export function serializeWorkflow(workflow: WorkflowConfig): string {
  return stringifyYaml(
    { workflow },
    { indent: 2, lineWidth: 80, minContentWidth: 20 }
  );
}
