// 스킬/아키타입 JSON 로드 + 메모리 캐시

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { SkillDefinition } from '../db/types/index.js';
import { InternalError } from '../common/errors/game-errors.js';
import {
  ArchetypeDefinitionSchema,
  SkillDefinitionSchema,
  type ArchetypeDefinition,
} from './content.types.js';

export function resolveContentDir(): string {
  return process.env.CONTENT_DIR ?? join(process.cwd(), 'content');
}

async function readList<T extends z.ZodTypeAny>(
  dir: string,
  file: string,
  schema: T,
): Promise<z.infer<T>[]> {
  const raw: unknown = JSON.parse(await readFile(join(dir, file), 'utf-8'));
  const result = z.array(schema).safeParse(raw);
  if (!result.success) {
    throw new InternalError(`Invalid content file ${file}`, {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private skills = new Map<string, SkillDefinition>();
  private archetypes = new Map<string, ArchetypeDefinition>();

  async onModuleInit() {
    await this.loadAll(resolveContentDir());
  }

  async loadAll(dir: string): Promise<void> {
    const [skillList, archetypeList] = await Promise.all([
      readList(dir, 'skills.json', SkillDefinitionSchema),
      readList(dir, 'archetypes.json', ArchetypeDefinitionSchema),
    ]);

    this.skills = new Map<string, SkillDefinition>(skillList.map((s) => [s.id, s]));
    this.archetypes = new Map<string, ArchetypeDefinition>(archetypeList.map((a) => [a.archetypeId, a]));

    for (const a of archetypeList) {
      const missing = a.skills.filter((id) => !this.skills.has(id));
      if (missing.length > 0) {
        throw new InternalError(`Archetype ${a.archetypeId} references unknown skills`, {
          missing,
        });
      }
    }
    this.logger.log(`Loaded ${this.skills.size} skills, ${this.archetypes.size} archetypes from ${dir}`);
  }

  getSkill(id: string): SkillDefinition | undefined {
    return this.skills.get(id);
  }

  getAllSkills(): SkillDefinition[] {
    return [...this.skills.values()];
  }

  getArchetype(id: string): ArchetypeDefinition | undefined {
    return this.archetypes.get(id);
  }

  getAllArchetypes(): ArchetypeDefinition[] {
    return [...this.archetypes.values()];
  }

  /** archetypeId → AI 프로필 태그 */
  archetypeProfiles(): Map<string, string> {
    return new Map<string, string>([...this.archetypes.values()].map((a) => [a.archetypeId, a.aiProfile]));
  }
}
