import type { TipRepository } from '../models/TipRepository';
import type { TipTypeRepository } from '../models/TipTypeRepository';
import { createTip, createTipType } from '../shared/domain';
import type { Tip, TipInput, TipType, TipTypeInput } from '../shared/types';
import { BaseService, type RepositoryResult } from './base/BaseService';
import type { ITipService } from './interfaces';

interface TipServiceDeps {
  tips: TipRepository;
  tipTypes: TipTypeRepository;
}

export class TipService extends BaseService<TipServiceDeps> implements ITipService {
  constructor(deps: TipServiceDeps) {
    super('TipService', deps);
  }

  async getById(id: number): Promise<RepositoryResult<Tip | null>> {
    return this.executeResult('getById', () => this.deps.tips.getById(id), { id });
  }

  async getAll(): Promise<RepositoryResult<Tip[]>> {
    return this.executeResult('getAll', () => this.deps.tips.getAll());
  }

  async getByType(tipTypeId: number): Promise<RepositoryResult<Tip[]>> {
    return this.executeResult('getByType', () => this.deps.tips.getByType(tipTypeId), { tipTypeId });
  }

  async create(input: TipInput): Promise<RepositoryResult<Tip>> {
    return this.executeResult('create', () => this.deps.tips.create(createTip(input)), { title: input.title });
  }

  async update(tip: Tip): Promise<RepositoryResult<Tip>> {
    return this.executeResult('update', () => this.deps.tips.update(tip), { id: tip.id });
  }

  async delete(id: number): Promise<RepositoryResult<boolean>> {
    return this.executeResult('delete', () => this.deps.tips.delete(id), { id });
  }

  async getRandomByType(tipTypeId: number): Promise<RepositoryResult<Tip | null>> {
    return this.executeResult('getRandomByType', () => this.deps.tips.getRandomByType(tipTypeId), { tipTypeId });
  }

  async getTipTypes(): Promise<RepositoryResult<TipType[]>> {
    return this.executeResult('getTipTypes', () => this.deps.tipTypes.getAll());
  }

  async createTipType(input: TipTypeInput): Promise<RepositoryResult<TipType>> {
    return this.executeResult('createTipType', () => this.deps.tipTypes.create(createTipType(input)), {
      name: input.name,
    });
  }
}
