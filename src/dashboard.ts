import type { ComparisonSet } from "./pipeline.js";
import { buildDashboard, renderDashboardMarkdown, type DashboardView } from "./presentation.js";
import type { DashboardSelection, DisplayUnit } from "./types.js";

function authFailure(set: ComparisonSet): string | undefined {
  const reports = set.secondary ? [set.primary, set.secondary] : [set.primary];
  for (const report of reports) {
    if (report.status === "error") {
      const rejected = report.errors.find(error => error.kind === "auth");
      if (rejected) {
        return rejected.message;
      }
    }
  }
  return undefined;
}

/**
 * What the user has selected and the last snapshot fetched for it.
 *
 * Snapshots replace each other wholesale; an AuthError banner, once seen,
 * stays for the rest of the session.
 */
export class DashboardStore {
  private selection: DashboardSelection;
  private latest?: ComparisonSet;
  private authBanner?: string;

  constructor(initial: DashboardSelection) {
    this.selection = { ...initial };
  }

  get current(): Readonly<DashboardSelection> {
    return { ...this.selection };
  }

  get snapshot(): ComparisonSet | undefined {
    return this.latest;
  }

  setCities(primary: string, secondary?: string): void {
    const compare = secondary?.trim();
    this.selection = {
      primary: primary.trim(),
      ...(compare ? { secondary: compare } : {}),
      unit: this.selection.unit,
    };
  }

  setUnit(unit: DisplayUnit): void {
    this.selection = { ...this.selection, unit };
  }

  apply(set: ComparisonSet): void {
    if (this.latest && set.cycle < this.latest.cycle) {
      return;
    }
    this.latest = set;
    this.authBanner ??= authFailure(set);
  }

  view(): DashboardView | undefined {
    if (!this.latest) {
      return undefined;
    }
    return buildDashboard(this.latest, this.selection.unit, { banner: this.authBanner });
  }

  markdown(): string {
    const view = this.view();
    if (!view) {
      return "# Weather Analytics Dashboard\n\n_Loading..._\n";
    }
    return renderDashboardMarkdown(view);
  }
}
