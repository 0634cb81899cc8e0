import express from 'express';

class ControllerRoot {
    handle(req: express.Request, res: express.Response) {
        res.json({
            success: true,
            data: {
                name: 'simulation-oee-tracker',
                docs: '/api-docs',
                health: '/api/health'
            }
        });
    }
}
export default new ControllerRoot()
