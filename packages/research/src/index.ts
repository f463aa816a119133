export { loadSections, fillTemplate } from "./sections.js";

export {
  ResearchGenerator,
  RESEARCH_SYSTEM_PROMPT,
  WEB_SEARCH_UNAVAILABLE,
  sectionHeading,
} from "./research-generator.js";
export type { ResearchGeneratorOptions, GenerateOptions } from "./research-generator.js";

export { JobSupervisor } from "./job-supervisor.js";
export type { JobContext, JobTask, JobSupervisorOptions } from "./job-supervisor.js";

export { ResearchWorkflow, reportDocument } from "./research-workflow.js";
export type { ResearchWorkflowOptions, ResearchRunOptions } from "./research-workflow.js";

export { ResearchService, createResearchServices } from "./research-service.js";
export type { ResearchSnapshot, ResearchServiceOverrides } from "./research-service.js";
