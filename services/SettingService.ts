import type { SettingRepository } from '../models/SettingRepository';
import { createSetting } from '../shared/domain';
import type { Setting, SettingInput } from '../shared/types';
import { BaseService, type RepositoryResult } from './base/BaseService';
import type { ISettingService } from './interfaces';

interface SettingServiceDeps {
  settings: SettingRepository;
}

export class SettingService extends BaseService<SettingServiceDeps> implements ISettingService {
  constructor(deps: SettingServiceDeps) {
    super('SettingService', deps);
  }

  async getByKey(key: string): Promise<RepositoryResult<Setting | null>> {
    return this.executeResult('getByKey', () => this.deps.settings.getByKey(key), { key });
  }

  async getAll(): Promise<RepositoryResult<Setting[]>> {
    return this.executeResult('getAll', () => this.deps.settings.getAll());
  }

  async create(input: SettingInput): Promise<RepositoryResult<Setting>> {
    return this.executeResult('create', () => this.deps.settings.create(createSetting(input)), { key: input.key });
  }

  async update(setting: Setting): Promise<RepositoryResult<Setting>> {
    return this.executeResult('update', () => this.deps.settings.update(setting), { key: setting.key });
  }

  async delete(key: string): Promise<RepositoryResult<boolean>> {
    return this.executeResult('delete', () => this.deps.settings.delete(key), { key });
  }

  async upsert(key: string, value: string, description?: string | null): Promise<RepositoryResult<Setting>> {
    return this.executeResult('upsert', () => this.deps.settings.upsert(key, value, description), { key });
  }

  async getAllAsDictionary(): Promise<RepositoryResult<Record<string, string>>> {
    return this.executeResult('getAllAsDictionary', () => this.deps.settings.getAllAsDictionary());
  }

  async cleanup(): Promise<void> {
    await this.deps.settings.clearCache();
  }
}
