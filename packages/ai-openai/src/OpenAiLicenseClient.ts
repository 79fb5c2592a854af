import {
  EMPTY_LICENSE,
  LicenseStatusSchema,
  findLicenseNumber,
  parseLooseJson
} from '@enrich/core';
import type { LicenseInfo, LicenseLookup, LookupSubject } from '@enrich/core';
import { LicenseAnswerSchema } from './schema';
import { OpenAiWebSearchClient } from './OpenAiWebSearchClient';

export class OpenAiLicenseClient extends OpenAiWebSearchClient implements LicenseLookup {
  async findLicense(subject: LookupSubject): Promise<LicenseInfo> {
    const city = subject.city ?? 'Ontario';
    const prompt = [
      `Find the ESA/ECRA license number for ${subject.businessName} in ${city}, Ontario.`,
      "The license number format is 'ECRA/ESA' followed by 7 digits (e.g. ECRA/ESA 7010353).",
      'Also determine if they are currently licensed (active/valid) or not.',
      'Return ONLY a JSON object: {"esa_license_number": "ECRA/ESA XXXXXXX" or null,',
      '"license_status": "active" or "inactive" or "unknown" or null,',
      '"master_electrician": true or false or null}.',
      'Use null if you cannot find the information.'
    ].join(' ');

    const text = await this.search(prompt, 1500);
    return interpretLicenseAnswer(text);
  }
}

export function interpretLicenseAnswer(text: string): LicenseInfo {
  const parsed = LicenseAnswerSchema.safeParse(parseLooseJson(text));
  if (parsed.success) {
    const answer = parsed.data;
    const status = LicenseStatusSchema.safeParse(answer.license_status?.toLowerCase());
    const number = answer.esa_license_number;
    return {
      esaLicenseNumber: number ? findLicenseNumber(number) ?? number : null,
      licenseStatus: status.success ? status.data : answer.license_status ? 'unknown' : null,
      masterElectrician: answer.master_electrician
    };
  }

  const number = findLicenseNumber(text);
  if (number) {
    return { esaLicenseNumber: number, licenseStatus: 'unknown', masterElectrician: null };
  }
  return EMPTY_LICENSE;
}
