import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { AppConfig } from '../../src/server/config';
import { initializeDatabase, openSession, type DbSession } from '../../src/server/db/DatabaseManager';
import { createCharacterSchema, createJutsuSchema, updateCharacterSchema } from '../../src/server/schemas';
import { CharacterService } from '../../src/server/services/CharacterService';
import { JutsuService } from '../../src/server/services/JutsuService';
import { cleanupTempDir, makeTempDir, steppingClock, testConfig } from '../helpers/testEnv';

const T0 = '2024-05-01T10:00:00.000Z';
const T1 = '2024-05-01T10:00:01.000Z';

describe('CharacterService', () => {
  let tmpDir: string;
  let config: AppConfig;
  let db: DbSession;
  let service: CharacterService;

  const create = (body: unknown) => service.create(createCharacterSchema.parse(body));

  beforeEach(async () => {
    tmpDir = makeTempDir();
    config = testConfig(tmpDir);
    await initializeDatabase(config);
    db = await openSession(config);
    service = new CharacterService(db, { now: steppingClock(T0).now });
  });

  afterEach(async () => {
    await db.close();
    cleanupTempDir(tmpDir);
  });

  it('creates a character with matching timestamps', async () => {
    const naruto = await create({ name: 'Naruto', village: 'Konoha' });
    expect(naruto).toEqual({
      id: 1,
      name: 'Naruto',
      village: 'Konoha',
      rank: null,
      created_at: T0,
      updated_at: T0,
    });
  });

  it('updates only the supplied fields and refreshes updated_at', async () => {
    const naruto = await create({ name: 'Naruto', village: 'Konoha', rank: 'Genin' });
    const updated = await service.update(naruto.id, updateCharacterSchema.parse({ rank: 'Hokage' }));
    expect(updated).toEqual({ ...naruto, rank: 'Hokage', updated_at: T1 });
  });

  it('raises NotFound for unknown ids', async () => {
    await expect(service.getById(5)).rejects.toMatchObject({ statusCode: 404, detail: 'Character not found' });
    await expect(service.update(5, {})).rejects.toMatchObject({ statusCode: 404, detail: 'Character not found' });
    await expect(service.delete(5)).rejects.toMatchObject({ statusCode: 404, detail: 'Character not found' });
  });

  it('searches name or village, case-insensitively', async () => {
    await create({ name: 'Naruto', village: 'Konoha' });
    await create({ name: 'Gaara', village: 'Suna' });
    await create({ name: 'Sakura', village: 'Konoha' });

    const konoha = await service.list({ page: 1, size: 10, search: 'konoha' });
    expect(konoha.items.map((c) => c.name)).toEqual(['Naruto', 'Sakura']);
    expect(konoha.total).toBe(2);

    const byName = await service.list({ page: 1, size: 10, search: 'aar' });
    expect(byName.items.map((c) => c.name)).toEqual(['Gaara']);
  });

  it('returns the second of three pages for twelve characters', async () => {
    for (let i = 1; i <= 12; i++) {
      await create({ name: `Character ${i}`, village: 'Konoha' });
    }
    const page = await service.list({ page: 2, size: 5 });
    expect(page.items.map((c) => c.id)).toEqual([6, 7, 8, 9, 10]);
    expect(page).toMatchObject({ total: 12, pages: 3, has_next: true, has_prev: true });
  });

  it('adds a jutsu owned by the character, ignoring any character_id in the body', async () => {
    const naruto = await create({ name: 'Naruto', village: 'Konoha' });
    const jutsu = await service.addJutsu(
      naruto.id,
      createJutsuSchema.parse({ name: 'Rasengan', type: 'Ninjutsu', character_id: 999 })
    );
    expect(jutsu).toEqual({
      id: 1,
      name: 'Rasengan',
      type: 'Ninjutsu',
      chakra_cost: 10,
      created_at: T1,
      updated_at: T1,
      character_id: naruto.id,
    });
  });

  it('refuses to add a jutsu to a missing character', async () => {
    await expect(
      service.addJutsu(42, createJutsuSchema.parse({ name: 'Chidori', type: 'Ninjutsu' }))
    ).rejects.toMatchObject({ statusCode: 404, detail: 'Character not found' });
    const row = await db.get('SELECT COUNT(*) AS n FROM jutsus');
    expect(row?.n).toBe(0);
  });

  it('keeps owned jutsu without an owner after deleting the character', async () => {
    const naruto = await create({ name: 'Naruto', village: 'Konoha' });
    const jutsu = await service.addJutsu(naruto.id, createJutsuSchema.parse({ name: 'Rasengan', type: 'Ninjutsu' }));

    await service.delete(naruto.id);

    await expect(service.getById(naruto.id)).rejects.toMatchObject({ statusCode: 404 });
    const orphan = await new JutsuService(db).getById(jutsu.id);
    expect(orphan.character_id).toBeNull();
  });
});
