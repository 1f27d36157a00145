import express, { type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import multer from 'multer'
import {
  handleBreakRepeatingKey,
  handleBreakSingleByte,
  handleEncryptRepeatingKey,
  type ApiContext,
  type ApiResponse,
} from './api.js'

export interface AppOptions {
  maxUploadBytes: number
}

function send(res: Response, response: ApiResponse): void {
  res.status(response.status).json(response.body)
}

// body-parser errors carry a `type` such as 'entity.parse.failed' and a 4xx status
function isBodyParserError(error: unknown): error is Error & { type: string; status: number } {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  )
}

// Map middleware failures to the same `{ error }` answers as the routes
function clientErrorStatus(error: unknown): number | undefined {
  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE' ? 413 : 400
  }
  if (isBodyParserError(error)) return error.status
  return undefined
}

export function createApp(context: ApiContext, options: AppOptions): express.Express {
  const logger = context.logger ?? console
  const app = express()

  // Middleware
  app.use(cors())
  app.use(express.json({ limit: options.maxUploadBytes }))

  // Configure multer for ciphertext file uploads
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxUploadBytes,
    },
  })

  // Health check route
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() })
  })

  // Single-byte XOR break route
  app.post('/api/break/single-byte', (req, res) => {
    try {
      send(res, handleBreakSingleByte(req.body, context))
    } catch (error) {
      logger.error('Single-byte break error:', error)
      res.status(500).json({ error: 'Internal server error' })
    }
  })

  // Repeating-key XOR break route (JSON or multipart with a Base64 file)
  app.post('/api/break/repeating-key', upload.single('file'), async (req, res) => {
    try {
      const uploaded = req.file ? req.file.buffer.toString('utf8') : undefined
      const response = await handleBreakRepeatingKey(req.body, context, uploaded)
      if (response.status === 200) {
        logger.log('Recovered repeating key:', { keySize: response.body.keySize, score: response.body.score })
      }
      send(res, response)
    } catch (error) {
      logger.error('Repeating-key break error:', error)
      res.status(500).json({ error: 'Internal server error' })
    }
  })

  // Repeating-key XOR encryption route
  app.post('/api/encrypt/repeating-key', (req, res) => {
    try {
      send(res, handleEncryptRepeatingKey(req.body))
    } catch (error) {
      logger.error('Encryption error:', error)
      res.status(500).json({ error: 'Internal server error' })
    }
  })

  // Errors raised before a route runs (JSON parsing, uploads)
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error)
      return
    }
    const status = clientErrorStatus(error)
    if (status !== undefined && error instanceof Error) {
      res.status(status).json({ error: error.message })
      return
    }
    logger.error('Unhandled request error:', error)
    res.status(500).json({ error: 'Internal server error' })
  })

  return app
}
