import fs from 'fs';
import path from 'path';
import { PolicySchema, type PolicyConfig } from './policySchema';

export const DEFAULT_POLICY_PATH = 'config/policy.json';

// Load and validate policy config from JSON file
// Throws if file not found, not JSON, or validation fails
export function loadPolicyConfig(relative: string = DEFAULT_POLICY_PATH): PolicyConfig {
  const policyPath = path.resolve(process.cwd(), relative);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(policyPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to read configuration file at ${policyPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = PolicySchema.safeParse(raw);
  if (!result.success) {
    // Flatten zod issues into "path: message" lines
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration in ${policyPath}:\n${issues.join('\n')}`);
  }
  return result.data;
}
