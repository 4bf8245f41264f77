/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic — works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createQuestionnaireHandlers } from './questionnaire.js';
import { createMatchingHandlers } from './matching.js';
import { createJourneyHandlers } from './journeys.js';
import { createFeedbackHandlers } from './feedback.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const ID = '[^/]+';

export function createRouter(container: Container) {
  const questionnaire = createQuestionnaireHandlers(container);
  const matching = createMatchingHandlers(container);
  const journeys = createJourneyHandlers(container);
  const feedback = createFeedbackHandlers(container);

  const path = (suffix: string) => new RegExp(`^/api/v1/${suffix}/?$`);

  const routes: Route[] = [
    // Questionnaire
    { method: 'GET', pattern: path('questionnaire'), handler: questionnaire.getCatalog },
    { method: 'PUT', pattern: path('questionnaire/responses'), handler: questionnaire.writeAnswers },

    // Matching
    { method: 'GET', pattern: path(`compatibility/${ID}`), handler: matching.compatibility },
    { method: 'GET', pattern: path('candidates'), handler: matching.candidates },

    // Journeys
    { method: 'POST', pattern: path('journeys'), handler: journeys.create },
    { method: 'GET', pattern: path('journeys'), handler: journeys.list },
    { method: 'GET', pattern: path(`journeys/${ID}`), handler: journeys.getById },
    { method: 'POST', pattern: path(`journeys/${ID}/respond`), handler: journeys.respond },
    { method: 'POST', pattern: path(`journeys/${ID}/end`), handler: journeys.end },
    { method: 'POST', pattern: path(`journeys/${ID}/meetings`), handler: journeys.proposeMeeting },
    {
      method: 'POST',
      pattern: path(`journeys/${ID}/meetings/${ID}/respond`),
      handler: journeys.respondToMeeting,
    },
    {
      method: 'POST',
      pattern: path(`journeys/${ID}/meetings/${ID}/complete`),
      handler: journeys.completeMeeting,
    },

    // Feedback
    { method: 'POST', pattern: path(`journeys/${ID}/meetings/${ID}/feedback`), handler: feedback.submit },
    { method: 'GET', pattern: path(`journeys/${ID}/meetings/${ID}/feedback`), handler: feedback.forMeeting },
    { method: 'GET', pattern: path('feedback'), handler: feedback.mine },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Authorization, Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
