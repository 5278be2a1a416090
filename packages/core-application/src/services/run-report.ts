import type {
  ActionMode,
  ActionPlan,
  DetectionMethod,
  DuplicateKind,
  RecommendedStrategy,
  ExtractionFailure,
  FileOperation,
  MethodScores,
  OperationOutcome,
  RunResult,
  RunStatistics,
  RunStatus,
} from "@photo-dedupe/core-domain";

import { formatBytes, formatDuration } from "../utils/format";

export const REPORT_VERSION = 1;

export type ReportFileRole = "keeper" | "duplicate" | "member";

export type ReportFileEntry = {
  path: string;
  role: ReportFileRole;
  sizeBytes: number | null;
  modifiedAtIso: string | null;
  scores: MethodScores;
  action: {
    outcome: OperationOutcome;
    dryRun: boolean;
    destination?: string;
    reason?: string;
  } | null;
};

export type ReportGroupEntry = {
  id: number;
  kind: DuplicateKind;
  recommendedStrategy: RecommendedStrategy;
  score: number;
  triggeredMethods: DetectionMethod[];
  strategy: ActionPlan["strategy"] | null;
  rationale: string | null;
  keeper: string | null;
  totalBytes: number;
  potentialSavingsBytes: number;
  files: ReportFileEntry[];
};

export type RunReport = {
  version: number;
  generatedAtIso: string;
  status: RunStatus;
  action: ActionMode;
  startedAtIso: string;
  finishedAtIso: string;
  elapsedMs: number;
  statistics: RunStatistics;
  groups: ReportGroupEntry[];
  failures: ExtractionFailure[];
  reportPath?: string;
};

function roleOf(path: string, plan: ActionPlan | undefined): ReportFileRole {
  if (!plan || plan.kind === "review") return "member";
  return plan.keeper === path ? "keeper" : "duplicate";
}

function actionOf(op: FileOperation | undefined): ReportFileEntry["action"] {
  if (!op) return null;
  return {
    outcome: op.outcome,
    dryRun: op.dryRun,
    ...(op.destination !== undefined ? { destination: op.destination } : {}),
    ...(op.reason !== undefined ? { reason: op.reason } : {}),
  };
}

/** Structured, JSON-serialisable view of a run. */
export function buildRunReport(result: RunResult): RunReport {
  const plansByGroup = new Map(result.plans.map((p) => [p.groupId, p]));
  const moveBySource = new Map(
    result.operations.filter((op) => op.kind === "move").map((op) => [op.source, op])
  );

  const groups = result.groups.map((group): ReportGroupEntry => {
    const plan = plansByGroup.get(group.id);
    return {
      id: group.id,
      kind: group.kind,
      recommendedStrategy: group.recommendedStrategy,
      score: group.score,
      triggeredMethods: group.triggeredMethods,
      strategy: plan?.strategy ?? null,
      rationale: plan?.rationale ?? null,
      keeper: plan?.kind === "designated" ? plan.keeper : null,
      totalBytes: group.totalBytes,
      potentialSavingsBytes: group.potentialSavingsBytes,
      files: group.files.map((path) => {
        const info = result.files[path];
        return {
          path,
          role: roleOf(path, plan),
          sizeBytes: info ? info.size : null,
          modifiedAtIso: info ? new Date(info.mtimeMs).toISOString() : null,
          scores: group.memberScores[path] ?? {},
          action: actionOf(moveBySource.get(path)),
        };
      }),
    };
  });

  return {
    version: REPORT_VERSION,
    generatedAtIso: result.finishedAtIso,
    status: result.status,
    action: result.action,
    startedAtIso: result.startedAtIso,
    finishedAtIso: result.finishedAtIso,
    elapsedMs: result.elapsedMs,
    statistics: result.statistics,
    groups,
    failures: result.failures,
    ...(result.reportPath !== undefined ? { reportPath: result.reportPath } : {}),
  };
}

function outcomeLabel(op: FileOperation): string {
  const reason = op.reason ? ` (${op.reason})` : "";
  return `${op.outcome}${reason}`;
}

/** Plain-text rendering for terminals and logs. */
export function formatRunSummary(result: RunResult): string {
  const { statistics: s } = result;
  const lines: string[] = [];
  const headline = result.status === "cancelled" ? `Run cancelled during ${result.lastPhase}` : "Run completed";

  lines.push(
    `${headline} in ${formatDuration(result.elapsedMs)}: ${s.filesScanned} files scanned, ` +
      `${s.groupCount} groups, ${s.duplicateCount} duplicates, ${formatBytes(s.potentialSavingsBytes)} reclaimable`
  );

  const plansByGroup = new Map(result.plans.map((p) => [p.groupId, p]));
  const moveBySource = new Map(
    result.operations.filter((op) => op.kind === "move").map((op) => [op.source, op])
  );

  for (const group of result.groups) {
    lines.push("");
    lines.push(
      `Group ${group.id} (${group.kind}, score ${group.score.toFixed(2)}, ${group.triggeredMethods.join(", ")})`
    );
    const plan = plansByGroup.get(group.id);
    if (plan) lines.push(`  ${plan.rationale}`);

    for (const file of group.files) {
      const role = roleOf(file, plan);
      const tag = role === "keeper" ? "keep" : role === "duplicate" ? "dup " : "    ";
      const op = moveBySource.get(file);
      const target = op?.destination ? ` -> ${op.destination}` : "";
      const status = op ? ` [${outcomeLabel(op)}]` : "";
      lines.push(`  ${tag} ${file}${target}${status}`);
    }
  }

  if (result.failures.length > 0) {
    lines.push("");
    lines.push(`Skipped ${result.failures.length} unusable files:`);
    for (const f of result.failures) lines.push(`  ${f.code} ${f.path}: ${f.message}`);
  }

  const exports = result.operations.filter((op) => op.kind === "export");
  for (const op of exports) {
    lines.push("");
    lines.push(`Report ${op.destination ?? op.source}: ${outcomeLabel(op)}`);
  }

  return lines.join("\n");
}
