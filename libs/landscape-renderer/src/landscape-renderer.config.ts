import { registerAs } from '@nestjs/config'

export interface LandscapeRendererConfig {
  width: number
  height: number
}

export const landscapeRendererConfig = registerAs('landscapeRenderer', (): LandscapeRendererConfig => ({
  width: parseInt(process.env.LANDSCAPE_WIDTH || '296', 10),
  height: parseInt(process.env.LANDSCAPE_HEIGHT || '128', 10),
}))
