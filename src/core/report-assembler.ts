// src/core/report-assembler.ts

import type {
   FatalCode,
   Finding,
   InformationCode,
   RenderedReport,
   Report,
   WarningCode,
} from '../schema';

/**
 * Fold a nested Report into one submission-level report.
 *
 * Order is pre-order depth-first: a level's own findings, then each child
 * report in the order the matcher nested them. Nothing is re-sorted.
 */
export function assembleReport(root: Report): RenderedReport {
   const fatal: Finding<FatalCode>[] = [];
   const warnings: Finding<WarningCode>[] = [];
   const information: Finding<InformationCode>[] = [];

   const visit = (report: Report) => {
      fatal.push(...report.fatal);
      warnings.push(...report.warnings);
      information.push(...report.information);
      report.children.forEach(visit);
   };
   visit(root);

   return Object.freeze({
      fatal: Object.freeze(fatal),
      warnings: Object.freeze(warnings),
      information: Object.freeze(information),
   });
}

/**
 * A submission conforms when nothing fatal and nothing missing was found.
 * Unexpected extras never affect the verdict.
 */
export function isCompliant(report: RenderedReport): boolean {
   return report.fatal.length === 0 && report.warnings.length === 0;
}
