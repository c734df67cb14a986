import { describe, it, expect } from "vitest";
import * as path from "path";
import { CliUsageError, parseArgs } from "../../src/cli/parseArgs";

function argv(...args: string[]): string[] {
  return ["node", "campaign", ...args];
}

describe("parseArgs", () => {
  it("parses a content command with repeated platforms", () => {
    expect(
      parseArgs(argv("content", "Spring sale", "--platform", "twitter_post", "--platform", "tiktok", "--style", "casual"))
    ).toEqual({
      command: "content",
      brief: "Spring sale",
      platforms: ["twitter_post", "tiktok"],
      all: false,
      includeCta: true,
      style: "casual",
    });
  });

  it("parses batch-only flags and resolves the output directory", () => {
    const parsed = parseArgs(
      argv("batch", "Launch", "--all", "--image-style", "3d", "--include-base64", "--no-cta", "--out", "runs/1")
    );
    expect(parsed).toEqual({
      command: "batch",
      brief: "Launch",
      platforms: [],
      all: true,
      includeCta: false,
      outDir: path.resolve("runs/1"),
      imageStyle: "3d",
      includeBase64: true,
    });
  });

  it("accepts a template as the platform source", () => {
    const parsed = parseArgs(argv("content", "Hiring", "--template", "job_recruitment"));
    expect(parsed).toMatchObject({ command: "content", template: "job_recruitment", platforms: [] });
  });

  it("requires a brief and a platform source", () => {
    expect(() => parseArgs(argv("content"))).toThrow("'content' requires a campaign brief.");
    expect(() => parseArgs(argv("batch", "--all"))).toThrow("'batch' requires a campaign brief.");
    expect(() => parseArgs(argv("content", "Sale"))).toThrow(
      "'content' requires --platform, --all or --template."
    );
  });

  it("rejects conflicting platform sources", () => {
    expect(() => parseArgs(argv("content", "Sale", "--all", "--template", "product_launch"))).toThrow(
      "--all and --template cannot be combined."
    );
    expect(() => parseArgs(argv("content", "Sale", "--all", "--platform", "tiktok"))).toThrow(
      "--all and --platform cannot be combined."
    );
  });

  it("keeps image flags to the batch command", () => {
    expect(() => parseArgs(argv("content", "Sale", "--all", "--image-style", "3d"))).toThrow(
      'Unknown argument "--image-style"'
    );
  });

  it("validates enum values and flag values", () => {
    expect(() => parseArgs(argv("content", "Sale", "--all", "--style", "loud"))).toThrow(
      "--style must be one of: professional, casual, humorous, educational, promotional"
    );
    expect(() => parseArgs(argv("content", "Sale", "--platform"))).toThrow("--platform requires a value");
    expect(() => parseArgs(argv("content", "Sale", "--platform", "--all"))).toThrow("--platform requires a value");
  });

  it("parses cost with defaults", () => {
    expect(parseArgs(argv("cost", "--images-2k", "4", "--content-pieces", "4"))).toEqual({
      command: "cost",
      images1k: 0,
      images2k: 4,
      videoSeconds: 0,
      contentPieces: 4,
      imageModel: "imagen-3.0",
      videoModel: "veo3",
    });
  });

  it("rejects unknown models and non-numeric counts for cost", () => {
    expect(() => parseArgs(argv("cost", "--video-model", "sora"))).toThrow(
      "--video-model must be one of: veo2, veo3, veo3_fast"
    );
    expect(() => parseArgs(argv("cost", "--images-1k", "many"))).toThrow('--images-1k requires a number, got "many"');
  });

  it("parses the catalog commands", () => {
    expect(parseArgs(argv("health"))).toEqual({ command: "health" });
    expect(parseArgs(argv("platforms"))).toEqual({ command: "platforms" });
    expect(parseArgs(argv("pricing"))).toEqual({ command: "pricing" });
    expect(parseArgs(argv("templates"))).toEqual({ command: "templates" });
    expect(parseArgs(argv("templates", "product_launch"))).toEqual({ command: "templates", name: "product_launch" });
    expect(() => parseArgs(argv("health", "now"))).toThrow("'health' does not accept additional arguments.");
  });

  it("reports missing and unknown commands", () => {
    expect(() => parseArgs(argv())).toThrow(CliUsageError);
    expect(() => parseArgs(argv())).toThrow("No command provided.");
    expect(() => parseArgs(argv("publish"))).toThrow('Unknown command "publish"');
    expect(() => parseArgs(argv("--verbose"))).toThrow('Unknown flag "--verbose"');
  });
});
