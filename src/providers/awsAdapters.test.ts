import test from "node:test";
import assert from "node:assert/strict";
import { DetectSentimentCommand } from "@aws-sdk/client-comprehend";
import { DetectDocumentTextCommand } from "@aws-sdk/client-textract";
import { ComprehendSentimentDetector } from "./comprehendSentimentDetector";
import { CollaboratorError } from "./errors";
import { TextractTextDetector } from "./textractTextDetector";

test("textract detector returns LINE blocks in order for the S3 object", async () => {
  const inputs: unknown[] = [];
  const detector = new TextractTextDetector({
    client: {
      send: async (command: DetectDocumentTextCommand) => {
        inputs.push(command.input);
        return {
          Blocks: [
            { BlockType: "PAGE" },
            { BlockType: "LINE", Text: "First line" },
            { BlockType: "WORD", Text: "First" },
            { BlockType: "LINE", Text: "Second line" },
          ],
        };
      },
    },
  });

  assert.deepEqual(await detector.detectText({ container: "docs", key: "a.pdf" }), ["First line", "Second line"]);
  assert.deepEqual(inputs, [{ Document: { S3Object: { Bucket: "docs", Name: "a.pdf" } } }]);
});

test("comprehend detector maps the label and all four scores", async () => {
  const inputs: unknown[] = [];
  const detector = new ComprehendSentimentDetector({
    client: {
      send: async (command: DetectSentimentCommand) => {
        inputs.push(command.input);
        return { Sentiment: "MIXED", SentimentScore: { Positive: 0.4, Negative: 0.4, Mixed: 0.2 } };
      },
    },
  });

  const result = await detector.detectSentiment("so-so", "en");

  assert.deepEqual(result, { label: "MIXED", scores: { Positive: 0.4, Negative: 0.4, Neutral: 0, Mixed: 0.2 } });
  assert.deepEqual(inputs, [{ Text: "so-so", LanguageCode: "en" }]);
});

test("comprehend detector rejects unknown languages and empty answers", async () => {
  const detector = new ComprehendSentimentDetector({ client: { send: async () => ({}) } });

  await assert.rejects(detector.detectSentiment("text", "xx"), (error: unknown) => {
    assert.ok(error instanceof CollaboratorError);
    assert.equal(error.retryable, false);
    return true;
  });
  await assert.rejects(detector.detectSentiment("text", "en"), (error: unknown) => {
    assert.ok(error instanceof CollaboratorError);
    assert.equal(error.retryable, true);
    return true;
  });
});
