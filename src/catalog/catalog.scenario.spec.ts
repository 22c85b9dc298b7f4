import { Test, TestingModule } from '@nestjs/testing';
import { JwtModule } from '@nestjs/jwt';
import { AppConfigService } from '@core/config';
import { DepartmentRepository, JobRepository, LocationRepository } from '@core/database';
import { createInMemoryRepositories } from '@core/database/testing/in-memory-repositories';
import { CredentialService } from '@auth';
import { Role } from '@shared/enums/role.enum';
import { IntegrityGuardService } from './integrity/integrity-guard.service';
import { CatalogQueryService } from './query/catalog-query.service';
import { JobService } from './job/job.service';
import { LocationService } from './location/location.service';
import { DepartmentService } from './department/department.service';
import {
  CatalogConflictException,
  FailedPreconditionException,
} from './exceptions/catalog.exception';

/**
 * 端到端业务场景：登录 -> 建地点/部门/职位 -> 检索
 * 存储使用进程内替身
 */
describe('Catalog scenario', () => {
  let stores: ReturnType<typeof createInMemoryRepositories>;
  let credentialService: CredentialService;
  let locationService: LocationService;
  let departmentService: DepartmentService;
  let jobService: JobService;
  let catalogQueryService: CatalogQueryService;

  const mockAppConfigService = {
    jwt: {
      secret: 'test-secret-test-secret-test-secret',
      issuer: 'job-catalog',
      audience: 'job-catalog-clients',
    },
    admin: { username: 'admin', password: 'test-password' },
  };

  beforeEach(async () => {
    stores = createInMemoryRepositories();

    const module: TestingModule = await Test.createTestingModule({
      imports: [JwtModule.register({})],
      providers: [
        CredentialService,
        IntegrityGuardService,
        CatalogQueryService,
        JobService,
        LocationService,
        DepartmentService,
        { provide: AppConfigService, useValue: mockAppConfigService },
        { provide: LocationRepository, useValue: stores.locations },
        { provide: DepartmentRepository, useValue: stores.departments },
        { provide: JobRepository, useValue: stores.jobs },
      ],
    }).compile();

    credentialService = module.get<CredentialService>(CredentialService);
    locationService = module.get<LocationService>(LocationService);
    departmentService = module.get<DepartmentService>(DepartmentService);
    jobService = module.get<JobService>(JobService);
    catalogQueryService = module.get<CatalogQueryService>(CatalogQueryService);
  });

  const createHeadquarters = () =>
    locationService.create({
      title: 'HQ',
      city: 'Pune',
      state: 'MH',
      country: 'India',
      zip: '411001',
    });

  it('should let an administrator build and search the catalog', async () => {
    const { token } = credentialService.authenticate('admin', 'test-password');
    expect(credentialService.validateToken(token).roles).toContain(Role.Administrator);

    const location = await createHeadquarters();
    const department = await departmentService.create('Engineering');

    const before = Date.now();
    const job = await jobService.create({
      title: 'Backend Engineer',
      description: 'Design and build HTTP APIs',
      locationId: location.id,
      departmentId: department.id,
      closingDate: new Date('2030-01-31T00:00:00.000Z'),
    });

    expect(job.code).toMatch(/^JOB-[0-9A-F]{8}$/);
    expect(job.postedDate.getTime()).toBeGreaterThanOrEqual(before);
    expect(job.postedDate.getTime()).toBeLessThanOrEqual(Date.now());

    await expect(departmentService.create('Engineering')).rejects.toBeInstanceOf(
      CatalogConflictException,
    );

    const result = await catalogQueryService.listJobs({
      query: 'Backend',
      pageNumber: 1,
      pageSize: 10,
    });

    expect(result.total).toBe(1);
    expect(result.items[0].title).toBe('Backend Engineer');
    expect(result.items[0].location).toBe('HQ');
    expect(result.items[0].department).toBe('Engineering');
  });

  it('should write nothing when a job references a missing location', async () => {
    const department = await departmentService.create('Engineering');

    await expect(
      jobService.create({
        title: 'Backend Engineer',
        description: 'Design and build HTTP APIs',
        locationId: 99,
        departmentId: department.id,
        closingDate: new Date('2030-01-31T00:00:00.000Z'),
      }),
    ).rejects.toBeInstanceOf(FailedPreconditionException);

    await expect(stores.jobs.findAll()).resolves.toEqual([]);
  });

  it('should keep code and posted date when a job is replaced', async () => {
    const location = await createHeadquarters();
    const engineering = await departmentService.create('Engineering');
    const sales = await departmentService.create('Sales');
    const job = await jobService.create({
      title: 'Backend Engineer',
      description: 'Design and build HTTP APIs',
      locationId: location.id,
      departmentId: engineering.id,
      closingDate: new Date('2030-01-31T00:00:00.000Z'),
    });

    const updated = await jobService.update(job.id, {
      title: 'Solutions Engineer',
      description: 'Help customers',
      locationId: location.id,
      departmentId: sales.id,
      closingDate: new Date('2030-02-28T00:00:00.000Z'),
    });

    expect(updated.code).toBe(job.code);
    expect(updated.postedDate.getTime()).toBe(job.postedDate.getTime());
    expect(updated.departmentId).toBe(sales.id);
  });

  it('should allow a department to keep its own title and reject a taken one', async () => {
    const engineering = await departmentService.create('Engineering');
    await departmentService.create('Sales');

    await expect(departmentService.update(engineering.id, 'Engineering')).resolves.toEqual({
      id: engineering.id,
      title: 'Engineering',
    });
    await expect(departmentService.update(engineering.id, 'Sales')).rejects.toThrow(
      "Another department with title 'Sales' already exists.",
    );
  });

  it('should treat department titles as case-sensitive', async () => {
    await departmentService.create('Engineering');

    await expect(departmentService.create('engineering')).resolves.toMatchObject({
      title: 'engineering',
    });
  });
});
