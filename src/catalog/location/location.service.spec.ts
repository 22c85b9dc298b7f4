import { Test, TestingModule } from '@nestjs/testing';
import { LocationRepository } from '@core/database';
import { EntityNotFoundException } from '../exceptions/catalog.exception';
import { LocationService } from './location.service';

describe('LocationService', () => {
  let service: LocationService;

  const mockLocationRepository = {
    create: jest.fn(),
    update: jest.fn(),
    findAll: jest.fn(),
    findById: jest.fn(),
  };

  const fields = {
    title: 'HQ',
    city: 'Pune',
    state: 'MH',
    country: 'India',
    zip: '411001',
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [LocationService, { provide: LocationRepository, useValue: mockLocationRepository }],
    }).compile();

    service = module.get<LocationService>(LocationService);
  });

  it('should create a location', async () => {
    mockLocationRepository.create.mockResolvedValue({ id: 1, ...fields });

    await expect(service.create(fields)).resolves.toEqual({ id: 1, ...fields });
    expect(mockLocationRepository.create).toHaveBeenCalledWith(fields);
  });

  it('should replace every field on update', async () => {
    mockLocationRepository.update.mockResolvedValue({ id: 1, ...fields, city: 'Mumbai' });

    const updated = await service.update(1, { ...fields, city: 'Mumbai' });

    expect(updated.city).toBe('Mumbai');
    expect(mockLocationRepository.update).toHaveBeenCalledWith(1, { ...fields, city: 'Mumbai' });
  });

  it('should throw not found when updating an unknown location', async () => {
    mockLocationRepository.update.mockResolvedValue(null);

    await expect(service.update(9, fields)).rejects.toBeInstanceOf(EntityNotFoundException);
  });

  it('should throw not found when reading an unknown location', async () => {
    mockLocationRepository.findById.mockResolvedValue(null);

    await expect(service.findOne(9)).rejects.toThrow('Location with ID 9 was not found.');
  });
});
