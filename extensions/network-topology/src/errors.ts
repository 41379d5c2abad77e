/**
 * Hard failures raised at the edges (loader, configuration). The core
 * pipeline never throws for data problems.
 */

/** The export directory is missing or is not a directory. */
export class TopologyInputError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "TopologyInputError";
    this.path = path;
  }
}

/** Configuration failed schema validation or could not be read. */
export class TopologyConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.name = "TopologyConfigError";
    this.issues = issues;
  }
}
