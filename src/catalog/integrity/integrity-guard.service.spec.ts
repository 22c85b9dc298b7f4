import { Test, TestingModule } from '@nestjs/testing';
import { DepartmentRepository, LocationRepository } from '@core/database';
import { IntegrityGuardService } from './integrity-guard.service';
import {
  CatalogConflictException,
  FailedPreconditionException,
} from '../exceptions/catalog.exception';

describe('IntegrityGuardService', () => {
  let service: IntegrityGuardService;

  const mockLocationRepository = {
    exists: jest.fn(),
  };

  const mockDepartmentRepository = {
    exists: jest.fn(),
    findIdsByTitle: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        IntegrityGuardService,
        { provide: LocationRepository, useValue: mockLocationRepository },
        { provide: DepartmentRepository, useValue: mockDepartmentRepository },
      ],
    }).compile();

    service = module.get<IntegrityGuardService>(IntegrityGuardService);
  });

  describe('validateJobReferences', () => {
    it('should pass when both references exist', async () => {
      mockLocationRepository.exists.mockResolvedValue(true);
      mockDepartmentRepository.exists.mockResolvedValue(true);

      await expect(service.validateJobReferences(1, 2)).resolves.toBeUndefined();
      expect(mockLocationRepository.exists).toHaveBeenCalledWith(1);
      expect(mockDepartmentRepository.exists).toHaveBeenCalledWith(2);
    });

    it('should name the missing location', async () => {
      mockLocationRepository.exists.mockResolvedValue(false);
      mockDepartmentRepository.exists.mockResolvedValue(true);

      await expect(service.validateJobReferences(7, 2)).rejects.toThrow(
        'Location with ID 7 does not exist.',
      );
    });

    it('should name the missing department', async () => {
      mockLocationRepository.exists.mockResolvedValue(true);
      mockDepartmentRepository.exists.mockResolvedValue(false);

      await expect(service.validateJobReferences(1, 3)).rejects.toThrow(
        'Department with ID 3 does not exist.',
      );
    });

    it('should report both reasons when both references are missing', async () => {
      mockLocationRepository.exists.mockResolvedValue(false);
      mockDepartmentRepository.exists.mockResolvedValue(false);

      const error = await service.validateJobReferences(7, 3).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FailedPreconditionException);
      expect(error).toMatchObject({
        code: 'FAILED_PRECONDITION',
        details: {
          reasons: ['Location with ID 7 does not exist.', 'Department with ID 3 does not exist.'],
        },
      });
    });
  });

  describe('validateDepartmentTitleUnique', () => {
    it('should pass when no department has the title', async () => {
      mockDepartmentRepository.findIdsByTitle.mockResolvedValue([]);

      await expect(service.validateDepartmentTitleUnique('Engineering')).resolves.toBeUndefined();
    });

    it('should conflict on create when the title is taken', async () => {
      mockDepartmentRepository.findIdsByTitle.mockResolvedValue([4]);

      const error = await service
        .validateDepartmentTitleUnique('Engineering')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CatalogConflictException);
      expect(error).toMatchObject({
        message: "Department with title 'Engineering' already exists.",
        details: { title: 'Engineering' },
      });
    });

    it('should not conflict when the only holder of the title is the department itself', async () => {
      mockDepartmentRepository.findIdsByTitle.mockResolvedValue([4]);

      await expect(service.validateDepartmentTitleUnique('Engineering', 4)).resolves.toBeUndefined();
    });

    it('should conflict on update when another department holds the title', async () => {
      mockDepartmentRepository.findIdsByTitle.mockResolvedValue([2]);

      await expect(service.validateDepartmentTitleUnique('Engineering', 4)).rejects.toThrow(
        "Another department with title 'Engineering' already exists.",
      );
    });
  });
});
