import { Test, TestingModule } from '@nestjs/testing';
import { JwtAuthGuard } from '@auth';
import { CatalogQueryService } from '../query/catalog-query.service';
import { JobController } from './job.controller';
import { JobService } from './job.service';

describe('JobController', () => {
  let controller: JobController;

  const mockJobService = {
    create: jest.fn(),
    update: jest.fn(),
    getDetail: jest.fn(),
  };

  const mockCatalogQueryService = {
    listJobs: jest.fn(),
  };

  const postedDate = new Date('2024-05-01T08:00:00.000Z');
  const closingDate = new Date('2024-06-30T23:59:59.000Z');

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [JobController],
      providers: [
        { provide: JobService, useValue: mockJobService },
        { provide: CatalogQueryService, useValue: mockCatalogQueryService },
      ],
    })
      .overrideGuard(JwtAuthGuard)
      .useValue({ canActivate: () => true })
      .compile();

    controller = module.get<JobController>(JobController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('create', () => {
    it('should normalize the closing date and point Location at the new job', async () => {
      mockJobService.create.mockResolvedValue({ id: 12, code: 'JOB-1A2B3C4D' });
      const request = { protocol: 'http', get: jest.fn().mockReturnValue('localhost:8080') };
      const response = { location: jest.fn() };

      const result = await controller.create(
        {
          title: 'Backend Engineer',
          description: 'Build APIs',
          locationId: 1,
          departmentId: 2,
          closingDate: '2024-07-01T01:59:59+02:00',
        },
        request,
        response,
      );

      expect(mockJobService.create).toHaveBeenCalledWith({
        title: 'Backend Engineer',
        description: 'Build APIs',
        locationId: 1,
        departmentId: 2,
        closingDate,
      });
      expect(request.get).toHaveBeenCalledWith('host');
      expect(response.location).toHaveBeenCalledWith('http://localhost:8080/api/v1/jobs/12');
      expect(result).toEqual({ id: 12, code: 'JOB-1A2B3C4D' });
    });
  });

  describe('update', () => {
    it('should pass every field through', async () => {
      mockJobService.update.mockResolvedValue({ id: 3 });

      await controller.update(3, {
        title: 'Staff Engineer',
        description: 'Own APIs',
        locationId: 1,
        departmentId: 2,
        closingDate: '2024-06-30T23:59:59Z',
      });

      expect(mockJobService.update).toHaveBeenCalledWith(3, {
        title: 'Staff Engineer',
        description: 'Own APIs',
        locationId: 1,
        departmentId: 2,
        closingDate,
      });
    });
  });

  describe('list', () => {
    it('should map request fields and substitute N/A for missing titles', async () => {
      mockCatalogQueryService.listJobs.mockResolvedValue({
        total: 11,
        items: [
          {
            id: 4,
            code: 'JOB-00000004',
            title: 'Backend Engineer',
            location: 'HQ',
            department: null,
            postedDate,
            closingDate,
          },
        ],
      });

      const result = await controller.list({ q: 'backend', pageNo: 2, pageSize: 10 });

      expect(mockCatalogQueryService.listJobs).toHaveBeenCalledWith({
        query: 'backend',
        locationId: undefined,
        departmentId: undefined,
        pageNumber: 2,
        pageSize: 10,
      });
      expect(result).toEqual({
        total: 11,
        data: [
          {
            id: 4,
            code: 'JOB-00000004',
            title: 'Backend Engineer',
            location: 'HQ',
            department: 'N/A',
            postedDate,
            closingDate,
          },
        ],
      });
    });
  });

  describe('findOne', () => {
    it('should render nested relations with placeholders for a dangling location', async () => {
      mockJobService.getDetail.mockResolvedValue({
        id: 4,
        code: 'JOB-00000004',
        title: 'Backend Engineer',
        description: 'Build APIs',
        locationId: 9,
        departmentId: 2,
        location: null,
        department: { id: 2, title: 'Engineering' },
        postedDate,
        closingDate,
      });

      const result = await controller.findOne(4);

      expect(result.location).toEqual({
        id: 0,
        title: 'N/A',
        city: 'N/A',
        state: 'N/A',
        country: 'N/A',
        zip: 'N/A',
      });
      expect(result.department).toEqual({ id: 2, title: 'Engineering' });
      expect(result).not.toHaveProperty('locationId');
    });

    it('should propagate not found', async () => {
      mockJobService.getDetail.mockRejectedValue(new Error('Job with ID 4 was not found.'));

      await expect(controller.findOne(4)).rejects.toThrow('Job with ID 4 was not found.');
    });
  });
});
