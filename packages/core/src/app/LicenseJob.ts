import { EMPTY_LICENSE } from '../domain/models';
import type { LicenseInfo, ProviderPatch, ProviderRow } from '../domain/models';
import { describeError } from '../domain/errors';
import type { LicenseLookup } from '../ports/LicenseLookup';
import type { BatchWindow, ProviderRepo } from '../ports/ProviderRepo';
import { systemEnvironment, uniformDelayMs } from '../ports/JobEnvironment';
import type { JobEnvironment, JobLogger } from '../ports/JobEnvironment';

const LICENSED_CATEGORIES = new Set(['electrician', 'electrical']);
const TARGET_CATEGORY = 'electrician';

export interface LicenseJobReport {
  total: number;
  licensed: number;
  active: number;
  inactive: number;
  notFound: number;
  errors: number;
}

export class LicenseJob {
  constructor(
    private readonly repo: ProviderRepo,
    private readonly lookup: LicenseLookup,
    private readonly logger?: JobLogger,
    private readonly env: JobEnvironment = systemEnvironment
  ) {}

  async run(window: BatchWindow): Promise<LicenseJobReport> {
    const providers = await this.repo.listBatch({
      ...window,
      columns: ['id', 'business_name', 'city', 'category'],
      category: TARGET_CATEGORY,
      missingColumn: 'esa_license_number'
    });

    const report: LicenseJobReport = {
      total: providers.length,
      licensed: 0,
      active: 0,
      inactive: 0,
      notFound: 0,
      errors: 0
    };

    if (providers.length === 0) {
      this.logger?.info('No electricians left to check in this batch', { ...window });
      return report;
    }

    for (const [index, provider] of providers.entries()) {
      const position = `${index + 1}/${providers.length}`;
      try {
        const license = await this.lookupLicense(provider);
        await this.repo.update(provider.id, this.buildPatch(license));

        if (license.esaLicenseNumber) {
          report.licensed += 1;
          if (license.licenseStatus === 'active') {
            report.active += 1;
          } else if (license.licenseStatus === 'inactive') {
            report.inactive += 1;
          }
          this.logger?.info('Licence recorded', {
            position,
            providerId: provider.id,
            name: provider.name,
            license: license.esaLicenseNumber,
            status: license.licenseStatus ?? 'unknown'
          });
        } else {
          report.notFound += 1;
          this.logger?.info('No licence found', { position, providerId: provider.id, name: provider.name });
        }
      } catch (error) {
        report.errors += 1;
        this.logger?.error('Licence check failed', {
          position,
          providerId: provider.id,
          error: describeError(error)
        });
      }

      if (index < providers.length - 1) {
        await this.env.delay(uniformDelayMs(this.env, 4, 7));
      }
    }

    return report;
  }

  private async lookupLicense(provider: ProviderRow): Promise<LicenseInfo> {
    const category = (provider.category ?? TARGET_CATEGORY).toLowerCase();
    if (!LICENSED_CATEGORIES.has(category)) {
      return EMPTY_LICENSE;
    }
    return this.lookup.findLicense({ businessName: provider.name, city: provider.city });
  }

  private buildPatch(license: LicenseInfo): ProviderPatch {
    const patch: ProviderPatch = {};
    if (license.esaLicenseNumber) {
      patch.esa_license_number = license.esaLicenseNumber;
    }
    if (license.licenseStatus) {
      patch.license_status = license.licenseStatus;
    }
    if (license.masterElectrician !== null) {
      patch.master_electrician = license.masterElectrician;
    }
    // rows are marked as checked even when nothing was found
    patch.license_checked_at = this.env.now().toISOString();
    return patch;
  }
}
