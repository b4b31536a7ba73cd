// src/market/audience.ts
import type { AudienceDescriptor } from "./types";

const AUDIENCES: Record<string, AudienceDescriptor> = {
  project_management: {
    role: ["Project Managers", "Developers"],
    industry: ["Tech", "Consulting", "Construction"],
    company_size: ["Small", "Medium"],
  },
  "workflow Automation": {
    role: ["IT Professionals", "Operations Managers"],
    industry: ["Tech", "Manufacturing", "Finance"],
    company_size: ["Medium", "Large"],
  },
};

// Fresh arrays per call; the table itself never leaves this module.
export function determineTargetAudience(niche: string): AudienceDescriptor {
  const hit = Object.prototype.hasOwnProperty.call(AUDIENCES, niche) ? AUDIENCES[niche] : undefined;
  if (!hit) return { role: [], industry: [], company_size: [] };
  return {
    role: [...hit.role],
    industry: [...hit.industry],
    company_size: [...hit.company_size],
  };
}
