// Annotation-based exemptions.
// Purpose: let manifest authors opt a workload out of one or all checks, unless the config forbids it.

export const EXEMPT_ALL_ANNOTATION = "polaris.fairwinds.com/exempt";

export function checkExemptionAnnotation(checkId: string): string {
  return `polaris.fairwinds.com/${checkId}-exempt`;
}

export function isExempt(
  annotations: Readonly<Record<string, string>>,
  checkId: string,
  disallowExemptions: boolean,
): boolean {
  if (disallowExemptions) {
    return false;
  }

  return (
    isTrueAnnotation(annotations, EXEMPT_ALL_ANNOTATION) ||
    isTrueAnnotation(annotations, checkExemptionAnnotation(checkId))
  );
}

function isTrueAnnotation(annotations: Readonly<Record<string, string>>, key: string): boolean {
  if (!Object.hasOwn(annotations, key)) return false;
  return annotations[key].toLowerCase() === "true";
}
