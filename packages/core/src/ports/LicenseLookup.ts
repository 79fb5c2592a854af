import type { LicenseInfo, LookupSubject } from '../domain/models';

export interface LicenseLookup {
  findLicense(subject: LookupSubject): Promise<LicenseInfo>;
}
