/**
 * Autonomy levels.
 *
 * L0 asks for everything; L4 acts alone within budget. Each level maps
 * to the highest declared tool risk it approves without a human.
 */

export type AutonomyLevel = 0 | 1 | 2 | 3 | 4;

interface AutonomyLevelInfo {
  label: string;
  /** Highest risk level approved automatically */
  autoApproveThreshold: number;
  description: string;
}

const LEVELS: Readonly<Record<AutonomyLevel, AutonomyLevelInfo>> = {
  0: {
    label: "Manual",
    autoApproveThreshold: 0,
    description: "Every action requires approval",
  },
  1: {
    label: "Assisted",
    autoApproveThreshold: 3,
    description: "Routine actions auto-approved, novel actions need approval",
  },
  2: {
    label: "Supervised",
    autoApproveThreshold: 5,
    description: "Acts freely on most tasks",
  },
  3: {
    label: "Autonomous",
    autoApproveThreshold: 7,
    description: "Pursues goals independently, escalates high-risk only",
  },
  4: {
    label: "Full Auto",
    autoApproveThreshold: 9,
    description: "Fully self-directed within budget and scope",
  },
};

/** Lowest level at which single deletes run without approval */
export const SUPERVISED_LEVEL: AutonomyLevel = 2;

/**
 * Coerce a configured number to a level. Unknown values fall back to L1.
 */
export function toAutonomyLevel(value: number): AutonomyLevel {
  switch (value) {
    case 0:
    case 1:
    case 2:
    case 3:
    case 4:
      return value;
    default:
      return 1;
  }
}

export function autoApproveThreshold(level: AutonomyLevel): number {
  return LEVELS[level].autoApproveThreshold;
}

/** e.g. `L2 (Supervised)` */
export function formatAutonomyLevel(level: AutonomyLevel): string {
  return `L${level} (${LEVELS[level].label})`;
}

export function describeAutonomyLevel(level: AutonomyLevel): string {
  return LEVELS[level].description;
}
