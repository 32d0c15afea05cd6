import { z } from "zod";

/** Cached shape of a sample document (`samples` namespace). */
export const SampleDetailsSchema = z.object({
  accession: z.string().min(1),
  title: z.string(),
  organism: z.string(),
  attributes: z.record(z.string()),
  url: z.string(),
});

/** Cached shape of a project summary (`projects` namespace). */
export const ProjectDetailsSchema = z.object({
  accession: z.string().min(1),
  uid: z.string(),
  title: z.string(),
  description: z.string(),
  organism: z.string(),
  dataType: z.string(),
  submissionDate: z.string(),
  lastUpdate: z.string(),
  centerName: z.string(),
  url: z.string(),
});
