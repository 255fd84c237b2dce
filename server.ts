import express, { NextFunction, Request, Response } from "express";
import multer from "multer";
import * as path from "path";
import * as fs from "fs";
import {
    DocxExporter,
    ErrorCollector,
    S3ObjectStore,
    ShelfValidationError,
    getConfig,
    parseShelf,
    saveToObjectStore,
} from "./exporter";

const config = getConfig();
const app = express();

// Templates are small; keep them in memory instead of on disk
const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: 20 * 1024 * 1024 },
});

app.use(express.json({ limit: '25mb' }));

// Request logging middleware - logs ALL requests
app.use((req: Request, res: Response, next: NextFunction) => {
    console.log(`\n[${new Date().toISOString()}] ${req.method} ${req.path}`);
    if (req.method === 'POST') {
        console.log('  Content-Type:', req.get('content-type'));
    }
    next();
});

app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', storage: config.bucket ? 's3' : 'local' });
});

function readShelfPayload(req: Request): unknown {
    // multipart requests carry the shelf as a JSON string field
    const field: unknown = req.body?.shelf;
    if (typeof field === 'string') {
        return JSON.parse(field);
    }
    return field ?? req.body;
}

function exportFilename(shelfName: string): string {
    const base = shelfName.replace(/[^\w.-]+/g, '_').replace(/^_+|_+$/g, '') || 'shelf';
    return `${base}_${Date.now()}.docx`;
}

app.post('/api/export', upload.single('template'), async (req: Request, res: Response) => {
    let payload: unknown;
    try {
        payload = readShelfPayload(req);
    } catch (parseError) {
        console.error('[server] Shelf JSON could not be parsed:', parseError);
        return res.status(400).json({ error: 'Invalid shelf data format' });
    }

    try {
        const shelf = parseShelf(payload);
        console.log(`[server] Exporting shelf ${shelf.id} for user ${shelf.requestUserId}`);
        if (req.file) {
            console.log(`[server] Template: ${req.file.originalname} (${req.file.size} bytes)`);
        }

        const errors = new ErrorCollector();
        const exporter = new DocxExporter(shelf, {
            template: req.file?.buffer,
            errors,
            includeTableOfContents: req.query.toc === '1',
        });
        const buffer = await exporter.render();
        const filename = exportFilename(shelf.name);

        let downloadUrl: string;
        if (config.bucket) {
            const store = new S3ObjectStore(config.region);
            downloadUrl = await saveToObjectStore(store, config, buffer, shelf.id, shelf.requestUserId, filename);
        } else {
            const outputPath = path.join(config.outputDir, filename);
            fs.writeFileSync(outputPath, buffer);
            console.log(`[server] Written ${buffer.length} bytes to ${outputPath}`);
            downloadUrl = `/api/download/${encodeURIComponent(filename)}`;
        }

        res.json({
            success: true,
            downloadUrl,
            errors: errors.errors.map((error) => ({
                kind: error.kind,
                block: error.blockKey,
                message: error.message,
            })),
        });
    } catch (error) {
        if (error instanceof ShelfValidationError) {
            console.error(`[server] ${error.message}`);
            return res.status(400).json({ error: 'Invalid shelf', details: error.issues });
        }
        console.error('[server] Export failed:', error);
        res.status(500).json({
            error: 'Failed to export shelf',
            details: error instanceof Error ? error.message : String(error),
        });
    }
});

// Download an exported document from the local output directory
app.get('/api/download/:filename', (req: Request, res: Response) => {
    const filename = path.basename(req.params.filename);
    const filePath = path.join(config.outputDir, filename);
    console.log(`[server] Download request: ${filePath}`);

    if (!fs.existsSync(filePath)) {
        console.error(`[server] File not found: ${filePath}`);
        return res.status(404).json({ error: 'File not found', requested: filename });
    }

    res.download(filePath, (err: Error | null) => {
        if (err) {
            console.error('[server] Error downloading file:', err);
            if (!res.headersSent) {
                res.status(500).json({ error: 'Failed to download file' });
            }
        } else {
            console.log('[server] File sent successfully');
        }
    });
});

if (!fs.existsSync(config.outputDir)) {
    fs.mkdirSync(config.outputDir, { recursive: true });
    console.log(`[server] Created directory: ${config.outputDir}`);
}

process.on('unhandledRejection', (reason) => {
    console.error('UNHANDLED REJECTION:', reason);
});

app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
});
