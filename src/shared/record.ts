import { z } from "zod";

const text = z.string().nullable();

// Largest value the INTEGER sample_size column holds.
export const MAX_SAMPLE_SIZE = 2147483647;

export const recordSchema = z.object({
  gse_id: z.string().refine((value) => value.trim().length > 0, "must not be blank"),
  data_type: text,
  superseries: text,
  sample_size: z.number().int().nonnegative().max(MAX_SAMPLE_SIZE, `must be at most ${MAX_SAMPLE_SIZE}`).nullable(),
  title: text,
  organism: text,
  characteristics: text,
  extracted_molecule: text,
  extraction_protocol: text,
  library_strategy: text,
  library_source: text,
  library_selection: text,
  instrument_model: text,
  assay_description: text,
  data_processing: text,
  platform_id: text,
  sra_study_id: text,
  bioproject_id: text,
  file_types: text,
  submission_date: text,
  last_update_date: text,
  organization_name: text,
  contact_name: text,
  email: text,
  country: text,
  pmid: text,
  pmcid: text,
  doi: text,
  supervisor_name: text,
  supervisor_email: text,
  main_topic: text,
  pregnancy_trimester: text,
  birthweight_provided: text,
  ga_delivery_provided: text,
  ga_delivery_weeks: text,
  ga_collection_provided: text,
  ga_collection_weeks: text,
  sex_provided: text,
  parity_provided: text,
  gravidity_provided: text,
  offspring_number_provided: text,
  race_ethnicity_provided: text,
  genetic_ancestry_provided: text,
  maternal_height_provided: text,
  maternal_weight_provided: text,
  paternal_height_provided: text,
  paternal_weight_provided: text,
  maternal_age_provided: text,
  paternal_age_provided: text,
  pregnancy_complications_collected: text,
  delivery_mode_provided: text,
  pregnancy_complications_list: text,
  fetal_complications_listed: text,
  fetal_complications_list: text,
  other_phenotypes: text,
  hospital_center: text,
  sample_country: text
});

export type StudyRecord = z.infer<typeof recordSchema>;

export type RecordColumn = keyof StudyRecord;

// Column order of the table, the export and the detail view.
export const RECORD_COLUMNS = [
  "gse_id",
  "data_type",
  "superseries",
  "sample_size",
  "title",
  "organism",
  "characteristics",
  "extracted_molecule",
  "extraction_protocol",
  "library_strategy",
  "library_source",
  "library_selection",
  "instrument_model",
  "assay_description",
  "data_processing",
  "platform_id",
  "sra_study_id",
  "bioproject_id",
  "file_types",
  "submission_date",
  "last_update_date",
  "organization_name",
  "contact_name",
  "email",
  "country",
  "pmid",
  "pmcid",
  "doi",
  "supervisor_name",
  "supervisor_email",
  "main_topic",
  "pregnancy_trimester",
  "birthweight_provided",
  "ga_delivery_provided",
  "ga_delivery_weeks",
  "ga_collection_provided",
  "ga_collection_weeks",
  "sex_provided",
  "parity_provided",
  "gravidity_provided",
  "offspring_number_provided",
  "race_ethnicity_provided",
  "genetic_ancestry_provided",
  "maternal_height_provided",
  "maternal_weight_provided",
  "paternal_height_provided",
  "paternal_weight_provided",
  "maternal_age_provided",
  "paternal_age_provided",
  "pregnancy_complications_collected",
  "delivery_mode_provided",
  "pregnancy_complications_list",
  "fetal_complications_listed",
  "fetal_complications_list",
  "other_phenotypes",
  "hospital_center",
  "sample_country"
] as const satisfies readonly RecordColumn[];

export const ID_COLUMN = "gse_id" satisfies RecordColumn;

export const KEYWORD_COLUMNS = [
  "title",
  "organism",
  "pregnancy_complications_list",
  "fetal_complications_list",
  "contact_name"
] as const satisfies readonly RecordColumn[];

export type KeywordColumn = (typeof KEYWORD_COLUMNS)[number];

export const FILTER_COLUMNS = {
  organism: "organism",
  dataType: "data_type",
  libraryStrategy: "library_strategy",
  platformId: "platform_id",
  pregnancyTrimester: "pregnancy_trimester"
} as const satisfies Record<string, RecordColumn>;

export type FilterKey = keyof typeof FILTER_COLUMNS;

export type FilterColumn = (typeof FILTER_COLUMNS)[FilterKey];

export const FILTER_KEYS = [
  "organism",
  "dataType",
  "libraryStrategy",
  "platformId",
  "pregnancyTrimester"
] as const satisfies readonly FilterKey[];
