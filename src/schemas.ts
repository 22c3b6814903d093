// tagfold JSON Schemas
// Generated from Zod schemas via z.toJSONSchema()

import { z } from "zod/v4";
import { LibraryDocumentSchema, ProgramDocumentSchema } from "./zod-schemas.js";

//==============================================================================
// Generated JSON Schemas
//==============================================================================

export const librarySchema = z.toJSONSchema(LibraryDocumentSchema);
export const programSchema = z.toJSONSchema(ProgramDocumentSchema);
