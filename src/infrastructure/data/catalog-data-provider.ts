import type { IDataProvider } from '@domain/ports/data-provider.js';
import type { Catalog, Employee, Project, SkillMarket } from '@domain/types/skills.js';
import { loadCatalog } from './data-files.js';

/**
 * IDataProvider over an in-memory catalog of employees, projects and
 * skill-market figures. Lookups by skill name ignore case.
 */
export class CatalogDataProvider implements IDataProvider {
  private readonly marketBySkill: Map<string, SkillMarket>;

  constructor(private readonly catalog: Catalog) {
    this.marketBySkill = new Map(catalog.market.map((m) => [m.skill.toLowerCase(), m]));
  }

  /** Load the built-in catalog, or the JSON file at `path`. */
  static fromFile(path?: string): CatalogDataProvider {
    return new CatalogDataProvider(loadCatalog(path));
  }

  listEmployees(): Employee[] {
    return this.catalog.employees.map((e) => structuredClone(e));
  }

  listProjects(): Project[] {
    return this.catalog.projects.map((p) => structuredClone(p));
  }

  getProject(id: string): Project | undefined {
    const project = this.catalog.projects.find((p) => p.id === id);
    return project ? structuredClone(project) : undefined;
  }

  getSkillMarket(skill: string): SkillMarket | undefined {
    return this.marketBySkill.get(skill.toLowerCase());
  }
}
