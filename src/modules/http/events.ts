import express, { Request, Response, Router } from 'express';
import { Filter } from 'mongodb';

import logger from '../../logger.js';
import { mongo } from '../../mongo.js';
import { EventCategory, EventDocument, getRecentEvents } from '../../utils/event-logger.js';
import { getPagination, queryString } from './utils.js';

function isEventCategory(value: string): value is EventCategory {
    return value === 'staking' || value === 'token';
}

export default function eventsRouter(): Router {
    const router: Router = express.Router();

    // GET /events?category=&action=&actor=&limit=&offset= - newest first
    router.get('/', async (req: Request, res: Response) => {
        const { limit, skip } = getPagination(req);
        const rawCategory = queryString(req.query.category);
        const action = queryString(req.query.action);
        const actor = queryString(req.query.actor);
        if (rawCategory && !isEventCategory(rawCategory)) {
            res.json({ data: [], total: 0, limit, skip });
            return;
        }
        const category = rawCategory && isEventCategory(rawCategory) ? rawCategory : undefined;
        try {
            if (mongo.isConnected()) {
                const query: Filter<EventDocument> = {};
                if (category) query.category = category;
                if (action) query.action = action;
                if (actor) query.actor = actor;
                const collection = mongo.getDb().collection<EventDocument>('events');
                const data = await collection.find(query).sort({ timestamp: -1 }).skip(skip).limit(limit).toArray();
                const total = await collection.countDocuments(query);
                res.json({ data, total, limit, skip });
                return;
            }

            const matching = getRecentEvents(Number.MAX_SAFE_INTEGER)
                .filter(e => (!category || e.category === category) && (!action || e.action === action) && (!actor || e.actor === actor))
                .reverse();
            res.json({ data: matching.slice(skip, skip + limit), total: matching.length, limit, skip });
        } catch (error) {
            logger.error('[http] Error fetching events:', error);
            res.status(500).json({ message: 'Error fetching events' });
        }
    });

    return router;
}
