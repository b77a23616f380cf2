export const SERVER_INSTRUCTIONS = `# Prompt Refinery MCP

Selects a role, prompting technique and generation parameters for a query, then asks the configured model to grade and rewrite the wrapped prompt until it reaches a quality threshold or runs out of iterations.

## Quick Start

| Goal | Tool | Model calls |
|------|------|-------------|
| Full refinement | \`refine_prompt\` | One per iteration |
| Initial configuration only | \`select_configuration\` | None |
| Clamp generation parameters | \`validate_parameters\` | None |

## Tools

### refine_prompt
Runs the refinement loop. The loop always executes at least \`minIterations\` passes and stops early only when the model scores the candidate at or above \`qualityThreshold\`. It never runs more than \`maxIterations\` passes.

**Example:**
\`\`\`json
{ "query": "Solve this equation: 3x^2 + 2x - 5 = 0", "maxIterations": 4 }
\`\`\`

### select_configuration
Returns the rule-based role, task type, technique, composed template and preset parameters for a query.

### validate_parameters
Parses and clamps generation parameters, optionally on top of a named preset (\`creative\`, \`precise\`, \`balanced\`, \`chat\`, \`code\`). Unparsable values fall back to 0.7, 2048 and 1024.

| Bounds | temperature | num_ctx | num_predict |
|--------|-------------|---------|-------------|
| \`analysis\` (default) | 0 - 1 | 512 - 8192 | 64 - 4096 |
| \`delivery\` | 0.1 - 1 | 1024 - 8192 | 512 - 4096 |

## Techniques
\`zero_shot\`, \`few_shot\`, \`chain_of_thought\`, \`self_consistency\`, \`tree_of_thought\`, \`role_playing\`, \`structured_output\`, \`socratic\`, \`guided_conversation\`

## Notes
- Every returned template contains the \`{query}\` placeholder.
- Final parameters are clamped to temperature [0.1, 1], num_ctx [1024, 8192], num_predict [512, 4096].
- Model failures never abort a refinement run; they count as zero-quality iterations.`;
