import { describe, expect, test } from "vitest"
import { animalProfilesPrompt, captionEventsPrompt, fillTemplate, promptVersion, receiptPrompt } from "../src/prompts.js"

describe("prompts", () => {
  test("carry a version header", () => {
    expect(promptVersion(captionEventsPrompt)).toBe("caption-events v3")
    expect(promptVersion(animalProfilesPrompt)).toBe("animal-profiles v2")
    expect(promptVersion(receiptPrompt)).toBe("receipt v2")
    expect(promptVersion("no header")).toBe("unversioned")
  })

  test("fill known placeholders and keep unknown ones", () => {
    expect(fillTemplate("{{NAMES}} / {{CAPTION}} / {{OTHER}}", { NAMES: "luna", CAPTION: "hola" })).toBe(
      "luna / hola / {{OTHER}}"
    )
  })
})
