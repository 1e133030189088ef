import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Pool } from "pg";
import { UmlsService } from "../services/umlsService.js";
import {
  createConceptLookupTool,
  createCuiToNameTool,
  createGetRelatedTool,
} from "./umls.js";

describe("UMLS tools", () => {
  let mockQuery: ReturnType<typeof vi.fn>;
  let umls: UmlsService;

  beforeEach(() => {
    mockQuery = vi.fn();
    const mockPool = { query: mockQuery };
    umls = new UmlsService(mockPool as unknown as Pool);
  });

  describe("umls_concept_lookup", () => {
    it("returns the CUI for a known name", async () => {
      mockQuery.mockResolvedValue({ rows: [{ cui: "C0006142" }] });

      const result = await createConceptLookupTool(umls).invoke({
        name: "Breast Carcinoma",
      });

      expect(JSON.parse(result)).toEqual({
        name: "Breast Carcinoma",
        cui: "C0006142",
      });
    });

    it("reports an unknown name", async () => {
      mockQuery.mockResolvedValue({ rows: [] });

      const result = await createConceptLookupTool(umls).invoke({
        name: "not a concept",
      });

      expect(result).toBe('No UMLS concept named "not a concept".');
    });
  });

  describe("umls_get_related", () => {
    it("lists related CUIs", async () => {
      mockQuery.mockResolvedValue({
        rows: [{ cui1: "C0000001" }, { cui1: "C0000002" }],
      });

      const result = await createGetRelatedTool(umls).invoke({
        fromCui: "C0006142",
        rela: "may_be_treated_by",
      });

      expect(JSON.parse(result)).toEqual({
        fromCui: "C0006142",
        rela: "may_be_treated_by",
        related: ["C0000001", "C0000002"],
      });
    });

    it("rejects an identifier that is not a CUI", async () => {
      await expect(
        createGetRelatedTool(umls).invoke({ fromCui: "12345", rela: "isa" }),
      ).rejects.toThrow();
      expect(mockQuery).not.toHaveBeenCalled();
    });

    it("turns a database error into a message", async () => {
      mockQuery.mockRejectedValue(new Error("connection refused"));

      const result = await createGetRelatedTool(umls).invoke({
        fromCui: "C0006142",
        rela: "isa",
      });

      expect(result).toBe("UMLS relation lookup failed: connection refused.");
    });
  });

  describe("umls_cui_to_name", () => {
    it("prefers the PF/PT term", async () => {
      mockQuery.mockResolvedValue({
        rows: [
          { str: "Breast cancer NOS", tty: "SY" },
          { str: "Malignant neoplasm of breast", tty: "PT" },
        ],
      });

      const result = await createCuiToNameTool(umls).invoke({
        cui: "C0006142",
      });

      expect(JSON.parse(result)).toEqual({
        cui: "C0006142",
        name: "Malignant neoplasm of breast",
      });
    });

    it("reports a CUI without English names", async () => {
      mockQuery.mockResolvedValue({ rows: [] });

      const result = await createCuiToNameTool(umls).invoke({
        cui: "C9999999",
      });

      expect(result).toBe("No English name recorded for C9999999.");
    });
  });
});
