import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InternalError } from '../common/errors/game-errors.js';
import { ContentLoaderService } from './content-loader.service.js';

const CONTENT_DIR = join(__dirname, '..', '..', 'content');

describe('ContentLoaderService', () => {
  it('스킬/아키타입 카탈로그 로드', async () => {
    const loader = new ContentLoaderService();
    await loader.loadAll(CONTENT_DIR);

    expect(loader.getAllSkills()).toHaveLength(18);
    expect(loader.getAllArchetypes()).toHaveLength(13);
    expect(loader.getSkill('fireball')).toMatchObject({ targeting: 'AREA', radius: 1, hitsAllies: true });
    expect(loader.getArchetype('iron_guard')?.aiProfile).toBe('defender');
    expect(loader.archetypeProfiles().get('field_medic')).toBe('support');
    expect(loader.archetypeProfiles().get('bog_witch')).toBe('controller');
  });

  describe('잘못된 컨텐츠', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'battle-ai-content-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('스키마 위반은 InternalError', async () => {
      await writeFile(join(dir, 'skills.json'), JSON.stringify([{ id: 'x', targeting: 'SKY' }]));
      await writeFile(join(dir, 'archetypes.json'), '[]');

      await expect(new ContentLoaderService().loadAll(dir)).rejects.toBeInstanceOf(InternalError);
    });

    it('없는 스킬을 참조하는 아키타입', async () => {
      await writeFile(join(dir, 'skills.json'), '[]');
      await writeFile(
        join(dir, 'archetypes.json'),
        JSON.stringify([{ archetypeId: 'ghost', name: 'Ghost', aiProfile: 'brute', skills: ['wail'] }]),
      );

      await expect(new ContentLoaderService().loadAll(dir)).rejects.toThrow(
        'Archetype ghost references unknown skills',
      );
    });
  });
});
