import { Router } from "express";
import multer from "multer";
import type { ImportService } from "../services/imports.js";
import type { ImportFormat } from "../import/extract.js";
import { HttpError } from "./errors.js";

const WRONG_EXTENSION: Record<ImportFormat, string> = {
  csv: "File must be a CSV file",
  json: "File must be a JSON file",
  xml: "File must be an XML file"
};

export function makeImportRoutes(args: { service: ImportService; maxBytes: number }) {
  const r = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: args.maxBytes, files: 1 } });

  for (const format of ["csv", "json", "xml"] as const) {
    r.post(`/${format}`, upload.single("file"), async (req, res) => {
      const file = req.file;
      if (!file) throw new HttpError(400, "No file uploaded");
      if (!file.originalname.toLowerCase().endsWith(`.${format}`)) {
        throw new HttpError(400, WRONG_EXTENSION[format]);
      }

      res.json(await args.service.importFile(format, file.buffer));
    });
  }

  return r;
}
