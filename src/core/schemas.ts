import { z } from 'zod';

const cid = z.number().int().positive();
const ids = z.union([cid, z.array(cid)]).transform((value) => (Array.isArray(value) ? value : [value]));

/**
 * One `PC_Compounds` record. Only the CID is checked; the rest of the record is
 * kept as delivered.
 */
export const compoundRecordSchema = z
  .object({
    id: z.object({ id: z.object({ cid }).passthrough() }).passthrough(),
  })
  .passthrough();

export const compoundsResponseSchema = z.object({
  PC_Compounds: z.array(compoundRecordSchema),
});

// Masses arrive as decimal strings.
const mass = z.coerce.number().optional();

/** One `PropertyTable` row. Properties that were not requested are absent. */
export const propertyRowSchema = z
  .object({
    CID: cid,
    MolecularFormula: z.string().optional(),
    MolecularWeight: mass,
    ExactMass: mass,
    MonoisotopicMass: mass,
    XLogP: z.number().optional(),
    TPSA: z.number().optional(),
    Charge: z.number().int().optional(),
    HBondDonorCount: z.number().int().optional(),
    HBondAcceptorCount: z.number().int().optional(),
    IUPACName: z.string().optional(),
    InChI: z.string().optional(),
    InChIKey: z.string().optional(),
    SMILES: z.string().optional(),
  })
  .passthrough();

export const propertiesResponseSchema = z.object({
  PropertyTable: z.object({ Properties: z.array(propertyRowSchema) }),
});

/** One `InformationList` entry of a synonyms lookup, keyed by CID or SID. */
export const synonymEntrySchema = z
  .object({
    CID: cid.optional(),
    SID: cid.optional(),
    Synonym: z.array(z.string()).default([]),
  })
  .passthrough();

export const synonymsResponseSchema = z.object({
  InformationList: z.object({ Information: z.array(synonymEntrySchema) }),
});

/** `IdentifierList` of a CID, SID or AID lookup; a single id is delivered as a scalar. */
export const identifierListResponseSchema = z.object({
  IdentifierList: z
    .object({
      CID: ids.optional(),
      SID: ids.optional(),
      AID: ids.optional(),
    })
    .passthrough(),
});

export const sourcesResponseSchema = z.object({
  InformationList: z.object({ SourceName: z.array(z.string()) }),
});

export type CompoundRecord = z.output<typeof compoundRecordSchema>;
export type PropertyRow = z.output<typeof propertyRowSchema>;
export type SynonymEntry = z.output<typeof synonymEntrySchema>;
