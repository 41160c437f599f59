import type { FeedbackRecord, ProjectRecord, TaskRecord } from './types';

export const REPLAN_SYSTEM_PROMPT =
  'You are an intelligent project planning assistant. Analyze user feedback and suggest specific adjustments to project tasks, priorities, and plans. Return your response as a valid JSON object.';

export const PLAN_SYSTEM_PROMPT =
  'You are an experienced project planner. Produce realistic, actionable project plans. Respond only with a valid JSON object.';

export const CLASSIFICATION_SYSTEM_PROMPT =
  'You triage captured notes into projects and tasks. Respond only with a valid JSON object.';

const describeTask = (task: TaskRecord) => {
  const parts = [
    `status: ${task.status}`,
    `priority: ${task.priority}`,
    `estimate: ${task.estimatedHours === null ? 'none' : `${task.estimatedHours}h`}`,
    `due: ${task.dueDate ?? 'none'}`,
  ];
  return `- Task ${task.id}: ${task.title} (${parts.join(', ')})`;
};

const describeProject = (project: ProjectRecord) =>
  [`- Name: ${project.name}`, `- Description: ${project.description ?? 'No description'}`, `- Status: ${project.status}`].join(
    '\n'
  );

export const buildReplanPrompt = (project: ProjectRecord, tasks: TaskRecord[], feedback: FeedbackRecord) => {
  const focus = feedback.taskId ? tasks.find((task) => task.id === feedback.taskId) : undefined;
  const sections = [
    `Project Context:\n${describeProject(project)}`,
    `Current Tasks:\n${tasks.length ? tasks.map(describeTask).join('\n') : 'No tasks yet'}`,
  ];
  if (focus) sections.push(`Feedback is about:\n${describeTask(focus)}`);
  sections.push(`User Feedback${feedback.userName ? ` from ${feedback.userName}` : ''}:\n${feedback.feedbackText}`);
  sections.push(`Based on this feedback, analyze and suggest specific adjustments. Return a JSON object with:
{
  "summary": "Brief summary of analysis",
  "adjustments": [
    {
      "adjustment_type": "task_priority|task_description|task_status|new_task|remove_task|task_estimate|general",
      "task_id": "ID of affected task (if applicable)",
      "description": "What adjustment to make",
      "original_value": "Current value (if applicable)",
      "new_value": "Suggested new value",
      "reasoning": "Why this adjustment makes sense"
    }
  ]
}

Provide actionable, specific suggestions that directly address the user's feedback.`);
  return sections.join('\n\n');
};

export const buildPlanPrompt = (project: ProjectRecord, tasks: TaskRecord[]) => {
  const taskLines = tasks.map((task) => `- ${task.title} (priority: ${task.priority}, status: ${task.status})`);
  return `Create a project plan and roadmap for the following project.

Project: ${project.name}
Description: ${project.description ?? 'No description'}
Status: ${project.status}

Current tasks:
${taskLines.length ? taskLines.join('\n') : 'No tasks yet'}

Generate a project plan with the following structure as JSON:
{
  "summary": "Brief summary of the project plan",
  "goals": ["goal1", "goal2"],
  "roadmap_steps": [
    { "step_number": 1, "title": "Step title", "description": "What needs to be done", "estimated_duration": "1 week", "dependencies": [] }
  ],
  "milestones": [
    { "title": "Milestone name", "target_date": "relative time like 'end of month 1'", "deliverables": ["deliverable1"] }
  ],
  "risks": ["risk1"],
  "next_steps": ["action1"]
}

Guidelines:
- Break the project into 3-7 major roadmap steps
- Identify key milestones and deliverables
- Call out risks and how to mitigate them
- Base recommendations on the current task list and project status`;
};

export const buildClassificationPrompt = (content: string, tags: string[]) => `Analyze the following inbox item and decide the best action.

Inbox item: "${content}"${tags.length ? `\nTags: ${tags.join(', ')}` : ''}

Respond with a JSON object:
{
  "action": "create_project" | "create_task" | "attach_to_existing" | "no_action",
  "project_name": "project name when creating a project or the task's project",
  "project_description": "optional project description",
  "task_title": "task title when action is create_task",
  "task_description": "optional task description",
  "task_priority": "low" | "medium" | "high" | "urgent",
  "reasoning": "brief explanation"
}

Guidelines:
- Use "create_project" for a large initiative or goal
- Use "create_task" for a specific actionable item
- Use "no_action" for notes that need no follow-up
- Infer priority from urgency cues in the text`;
