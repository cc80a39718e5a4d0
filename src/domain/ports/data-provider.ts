import type { Employee, Project, SkillMarket } from '@domain/types/skills.js';

/**
 * Read-only source of organisational data the stages reason over.
 */
export interface IDataProvider {
  listEmployees(): Employee[];
  listProjects(): Project[];
  getProject(id: string): Project | undefined;
  getSkillMarket(skill: string): SkillMarket | undefined;
}
