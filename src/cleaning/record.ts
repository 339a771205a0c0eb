import { z } from 'zod';

const text = z.string().nullable();
const integer = z.number().int().nullable();
const taxIdType = z.enum(['EMPTY', 'INVALID', 'CNPJ', 'CPF']);

export const cleanAircraftRecordSchema = z.object({
  tail_number: text,
  owner_customer_name: text,
  owner_other: text,
  owner_state: text,
  owner_tax_id: text,
  owner_tax_id_type: taxIdType,
  owner_tax_id_print: text,
  operator_customer_name: text,
  operator_other: text,
  operator_state: text,
  operator_tax_id: text,
  operator_tax_id_type: taxIdType,
  operator_tax_id_print: text,
  owned_operated: z.boolean(),
  certificate_num: text,
  serial: text,
  operation_type: text,
  pilot_license_type: text,
  model: text,
  mfg: text,
  icao_type_desc: text,
  icao_type_code: text,
  max_takeoff_wgt: z.number(),
  min_crew_size: integer,
  max_passengers: integer,
  seats: integer,
  year_mfg: integer,
  age: integer,
  exp_date_iam: text,
  exp_date_ca: text,
  cancellation_date: text,
  cancellation_reason: text,
  interdiction_code: text,
  national_mark_1: text,
  national_mark_2: text,
  national_mark_3: text,
  foreign_tail_number: text,
  lien_description: text,
  agaircraft: z.boolean(),
});

export type CleanAircraftRecord = z.infer<typeof cleanAircraftRecordSchema>;
