import { promises as fs } from 'node:fs'
import { extname, resolve } from 'node:path'
import { z } from 'zod'
import { ToolFailure, type ToolGateway } from '../services/tool-gateway'
import { getOpenAI } from '../utils/llm'

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp'
}

const DEFAULT_QUESTION =
  'Describe this plot: axes, units, trends, outliers and anything that looks wrong (empty panels, overlapping labels, missing legends).'

export function registerPlotTools(gateway: ToolGateway, opts: { workdir: string; plotModel: string }) {
  gateway.register({
    name: 'analyze_plot',
    description: 'Inspect an image of a plot with a vision model and describe what it shows.',
    parameters: z.object({ path: z.string().min(1), question: z.string().min(1).nullable() }),
    handler: async ({ path, question }, ctx) => {
      const mime = MIME_TYPES[extname(path).toLowerCase()]
      if (!mime) throw new ToolFailure('UNSUPPORTED_FORMAT', `Unsupported image type: ${path}`)

      let data: Buffer
      try {
        data = await fs.readFile(resolve(opts.workdir, path))
      } catch {
        throw new ToolFailure('NOT_FOUND', `Cannot read image: ${path}`)
      }

      const completion = await getOpenAI().chat.completions.create(
        {
          model: opts.plotModel,
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: question ?? DEFAULT_QUESTION },
                { type: 'image_url', image_url: { url: `data:${mime};base64,${data.toString('base64')}` } }
              ]
            }
          ]
        },
        { signal: ctx.signal }
      )
      const text = completion.choices[0]?.message?.content?.trim()
      if (!text) throw new ToolFailure('EMPTY_RESULT', `No analysis returned for ${path}`)
      return text
    }
  })
}
