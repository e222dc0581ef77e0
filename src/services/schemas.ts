/**
 * Zod schemas for the parts of the OpenAlex and Crossref responses we read.
 *
 * Everything is nullish: providers omit fields freely, and a missing field
 * must become "unknown" on the record rather than a failed lookup.
 */

import { z } from 'zod';

const nullableString = z.string().nullish();
const nullableNumber = z.number().nullish();
const nullableBoolean = z.boolean().nullish();

// OpenAlex

export const OpenAlexCountsByYearSchema = z.object({
  year: z.number(),
  works_count: nullableNumber,
  cited_by_count: nullableNumber,
});

export const OpenAlexSourceSchema = z.object({
  id: z.string(),
  display_name: z.string(),
  issn_l: nullableString,
  issn: z.array(z.string()).nullish(),
  host_organization_name: nullableString,
  homepage_url: nullableString,
  country_code: nullableString,
  is_in_doaj: nullableBoolean,
  is_oa: nullableBoolean,
  is_core: nullableBoolean,
  is_indexed_in_scopus: nullableBoolean,
  works_count: nullableNumber,
  cited_by_count: nullableNumber,
  apc_usd: nullableNumber,
  summary_stats: z
    .object({
      h_index: nullableNumber,
      i10_index: nullableNumber,
      '2yr_mean_citedness': nullableNumber,
    })
    .nullish(),
  topics: z.array(z.object({ display_name: z.string() })).nullish(),
  counts_by_year: z.array(OpenAlexCountsByYearSchema).nullish(),
});

export const OpenAlexSourceListSchema = z.object({
  results: z.array(OpenAlexSourceSchema),
});

export const OpenAlexAuthorshipSchema = z.object({
  author: z
    .object({
      display_name: nullableString,
      orcid: nullableString,
    })
    .nullish(),
  institutions: z.array(z.object({ display_name: nullableString })).nullish(),
});

// Source as embedded in a work location
export const OpenAlexLocationSourceSchema = z.object({
  id: z.string(),
  display_name: nullableString,
  issn_l: nullableString,
  is_in_doaj: nullableBoolean,
  host_organization_name: nullableString,
});

export const OpenAlexLocationSchema = z.object({
  is_oa: nullableBoolean,
  source: OpenAlexLocationSourceSchema.nullish(),
});

export const OpenAlexWorkSchema = z.object({
  id: z.string(),
  doi: nullableString,
  title: nullableString,
  display_name: nullableString,
  publication_year: nullableNumber,
  publication_date: nullableString,
  language: nullableString,
  cited_by_count: nullableNumber,
  is_retracted: nullableBoolean,
  referenced_works_count: nullableNumber,
  authorships: z.array(OpenAlexAuthorshipSchema).nullish(),
  primary_location: OpenAlexLocationSchema.nullish(),
  locations: z.array(OpenAlexLocationSchema).nullish(),
  open_access: z.object({ is_oa: nullableBoolean }).nullish(),
});

export const OpenAlexWorkListSchema = z.object({
  results: z.array(OpenAlexWorkSchema),
});

// Work as returned when sampling a venue (only the fields we count)
export const OpenAlexSampledWorkListSchema = z.object({
  results: z.array(
    z.object({
      is_retracted: nullableBoolean,
      authorships: z.array(OpenAlexAuthorshipSchema).nullish(),
    })
  ),
});

export type OpenAlexSource = z.infer<typeof OpenAlexSourceSchema>;
export type OpenAlexWork = z.infer<typeof OpenAlexWorkSchema>;
export type OpenAlexAuthorship = z.infer<typeof OpenAlexAuthorshipSchema>;
export type OpenAlexLocation = z.infer<typeof OpenAlexLocationSchema>;

// Crossref

export const CrossRefUpdateSchema = z.object({
  type: z.string(),
  DOI: nullableString,
  source: nullableString,
  updated: z.object({ 'date-time': nullableString }).nullish(),
});

export const CrossRefWorkSchema = z.object({
  message: z.object({
    DOI: z.string(),
    title: z.array(z.string()).nullish(),
    'container-title': z.array(z.string()).nullish(),
    publisher: nullableString,
    author: z
      .array(
        z.object({
          given: nullableString,
          family: nullableString,
          name: nullableString,
        })
      )
      .nullish(),
    created: z.object({ 'date-time': nullableString }).nullish(),
    'update-to': z.array(CrossRefUpdateSchema).nullish(),
    'updated-by': z.array(CrossRefUpdateSchema).nullish(),
  }),
});

export type CrossRefWork = z.infer<typeof CrossRefWorkSchema>['message'];
export type CrossRefUpdate = z.infer<typeof CrossRefUpdateSchema>;
