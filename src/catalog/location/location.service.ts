import { Injectable, Logger } from '@nestjs/common';
import { LocationFields, LocationRecord, LocationRepository } from '@core/database';
import { EntityNotFoundException } from '../exceptions/catalog.exception';

@Injectable()
export class LocationService {
  private readonly logger = new Logger(LocationService.name);

  constructor(private readonly locationRepository: LocationRepository) {}

  async create(fields: LocationFields): Promise<LocationRecord> {
    const location = await this.locationRepository.create(fields);
    this.logger.log(`✅ 地点已创建: #${location.id} ${location.title}`);
    return location;
  }

  async update(id: number, fields: LocationFields): Promise<LocationRecord> {
    const location = await this.locationRepository.update(id, fields);
    if (!location) {
      throw new EntityNotFoundException('Location', id);
    }
    return location;
  }

  findAll(): Promise<LocationRecord[]> {
    return this.locationRepository.findAll();
  }

  async findOne(id: number): Promise<LocationRecord> {
    const location = await this.locationRepository.findById(id);
    if (!location) {
      throw new EntityNotFoundException('Location', id);
    }
    return location;
  }
}
