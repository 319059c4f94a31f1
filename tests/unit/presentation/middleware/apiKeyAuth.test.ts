import express from 'express';
import request from 'supertest';
import { createApiKeyAuth } from '../../../../src/presentation/middleware/apiKeyAuth';
import { errorHandler } from '../../../../src/presentation/middleware/errorHandler';

describe('createApiKeyAuth', () => {
    let app: express.Express;

    beforeEach(() => {
        app = express();
        app.use(express.json());
        app.post('/protected', createApiKeyAuth('test-api-key'), (_req, res) => {
            res.json({ ok: true });
        });
        app.use(errorHandler);
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should refuse to build without a key', () => {
        expect(() => createApiKeyAuth('')).toThrow('An API key is required to protect the avatar routes');
    });

    it('should accept the key from the X-API-Key header', async () => {
        const res = await request(app).post('/protected').set('X-API-Key', 'test-api-key').send({});

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ ok: true });
    });

    it('should accept the key from the request body', async () => {
        const res = await request(app).post('/protected').send({ key: 'test-api-key' });

        expect(res.status).toBe(200);
    });

    it('should prefer the header over the body', async () => {
        const res = await request(app)
            .post('/protected')
            .set('X-API-Key', 'wrong-key')
            .send({ key: 'test-api-key' });

        expect(res.status).toBe(401);
    });

    it('should fall back to the body key when the header is empty', async () => {
        const res = await request(app)
            .post('/protected')
            .set('X-API-Key', '')
            .send({ key: 'test-api-key' });

        expect(res.status).toBe(200);
    });

    it('should reject a missing key', async () => {
        const res = await request(app).post('/protected').send({});

        expect(res.status).toBe(401);
        expect(res.body).toEqual({
            error: { message: 'Invalid or missing API key', code: 'UnauthorizedError' },
        });
    });

    it('should reject a key of a different length', async () => {
        const res = await request(app).post('/protected').set('X-API-Key', 'test').send({});

        expect(res.status).toBe(401);
    });
});
