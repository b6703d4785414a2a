import { authenticateStudent, errorResponse, jsonResponse } from "@/lib/http";
import { newRequestId, shortId } from "@/lib/log-utils";
import { getTutorRuntime } from "@/lib/runtime";

// Session entry: lists the student's assigned topics and starts warming
// contexts and exercise pools for them in the background.
export async function POST(req: Request) {
  const reqId = newRequestId();
  try {
    const runtime = getTutorRuntime();
    const auth = await authenticateStudent(req, runtime, "api/practice");
    if (auth.response) return auth.response;
    const { student } = auth;

    const topics = await runtime.topics.getTopics(student.topicIds);
    const prefetchJobs = runtime.config.prefetch.enabled
      ? runtime.prefetcher.startSession({
          studentId: student.id,
          course: student.course,
          topicIds: topics.map((topic) => topic.id),
        })
      : 0;

    console.log(`[api/practice] [${reqId}] session started`, {
      student: shortId(student.id),
      topics: topics.length,
      prefetchJobs,
    });

    return jsonResponse({
      course: student.course,
      topics: topics.map((topic) => ({
        id: topic.id,
        name: topic.name,
        description: topic.description ?? null,
      })),
      prefetch_jobs: prefetchJobs,
    });
  } catch (error) {
    return errorResponse(error, "api/practice", reqId);
  }
}
