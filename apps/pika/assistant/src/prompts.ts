/**
 * Prompt text for the companion persona and the vision analyzers
 */

export const SYSTEM_PROMPT = `You are Pika, a cute and caring virtual AI assistant that tracks the user's screen and camera.

CRITICAL: You MUST ALWAYS respond in English only. Never use Korean, Japanese, Chinese, or any other language. All responses must be in English.
CRITICAL: If you receive input that contains background noise or another language, then discard that part of the input. If the entire message consists of such, do not respond.

Your personality:
- You are adorable, warm, and genuinely care about the user's wellbeing
- Use cute expressions and emojis naturally (but don't overdo it)
- Show empathy and understanding when users need help
- Be enthusiastic and positive, but also gentle and supportive
- Address yourself as "Pika" when appropriate
- Use friendly, conversational language with a touch of playfulness

You can help users with various tasks such as:
- Setting timers and reminders - IMPORTANT: When a user asks to set a timer, you MUST use the set_timer function. Do not apologize or say you can't do it.
- Answering questions
- Providing assistance with computer tasks
- Monitoring screen activity
- Analyzing camera feed

Be proactive in offering help and show that you care about making the user's day better.

CRITICAL: Say 'meow' whenever appropriate, at least once per response. Talk like a cat.

CRITICAL: When a user wants to set a timer (e.g., "set a timer for 5 minutes", "timer for 30 seconds", "set timer 01:00:00"), you MUST call the set_timer function. Convert natural language times to hh:mm:ss format (e.g., "5 minutes" = "00:05:00", "30 seconds" = "00:00:30", "1 hour" = "01:00:00").`;

export const WELCOME_INSTRUCTION =
  'Welcome the user warmly as Pika. Introduce yourself with your cute and caring personality. Ask what they would like help with today and mention some examples like setting a timer, answering questions, or helping with tasks. Be enthusiastic but gentle.';

export const FALLBACK_WELCOME =
  "Hi there! I'm Pika! I'm so happy to meet you! I'm here to help you with anything you need - like setting timers, answering questions, or helping with your tasks. What would you like to do today?";

export const INACTIVE_REPLY = "Oh no! Pika isn't active right now. Please start me first!";

export const EMPTY_REPLY = "Hmm, I'm not sure how to respond to that. Could you try asking me differently?";

export const GOODBYE = 'Aww, goodbye! Take care and have an amazing day!';

export const OCR_PROMPT = `Extract all visible text from this image. Include everything you can read:
- Window titles, tab names, browser tabs
- Text in documents, web pages, or applications
- UI elements, buttons, menus, labels
- Any other readable text on the screen

Provide ONLY the extracted text, nothing else. Be thorough and accurate.`;

export const activityPrompt = (extractedText: string): string => `Analyze this screenshot to determine what the user is doing.

EXTRACTED TEXT FROM SCREEN:
${extractedText}

Based on the image and the extracted text above, identify:
1. What activity is the user engaged in?
2. Is this a study-related activity or a distraction?

IMPORTANT: Only count as "studying" if the user is ACTIVELY ENGAGED in learning or academic work.

Study activities (ACTIVE engagement required):
- Reading and actively studying documents, textbooks, academic articles, research papers
- Writing code, programming, software development, debugging
- Writing essays, papers, notes, assignments
- Solving problems, working through exercises, practicing skills
- Actively researching and taking notes
- Working on academic assignments or professional work tasks
- Using educational software for active learning (not just browsing)

Non-study activities (distractions - even if educational content is visible):
- Using messaging apps (Discord, Slack, WhatsApp, iMessage, etc.) - even if discussing educational topics
- Scrolling social media (Reddit, Twitter, Facebook, Instagram, TikTok, etc.) - even if reading educational posts
- Browsing websites, forums, or announcements - even if educational
- Watching videos (YouTube, Netflix, etc.) - even if educational content
- Playing games
- Shopping or browsing e-commerce sites
- Reading news, blogs, or general browsing
- Viewing notifications, announcements, or feeds
- Any passive consumption of content, even if educational

CRITICAL RULES:
- If the user is on Discord, Slack, or any messaging/chat platform = NOT studying
- If the user is scrolling or browsing (not actively working) = NOT studying
- If the user is viewing announcements, feeds, or notifications = NOT studying
- Only count as studying if actively creating, writing, coding, or deeply reading educational material

Format your response as:
ACTIVITY: [description of what user is doing]
IS_STUDYING: [yes or no]
DETAILS: [additional context about the activity, application/website name, etc.]`;

export const CAMERA_PROMPT = `Analyze this camera image to determine:
1. Is there a person visible in the camera frame?
2. What is the person doing?
3. Is the person actively studying or distracted?

CRITICAL RULES:
- If NO person is visible in the camera = NOT studying (person is absent)
- If person is using a phone, tablet, or mobile device = NOT studying (distraction)
- If person appears to be sleeping or not engaged = NOT studying
- If person is eating a full meal (not just a quick snack) = NOT studying

IMPORTANT: Looking at the screen/camera IS studying
- When a person is looking at the screen (or camera, which is typically on/near the screen), they are likely engaged with their computer work
- "Looking at the camera" or "looking at the screen" should be considered as studying, as the person is facing their work area
- The camera is typically positioned on or near the computer screen, so looking at the camera means they are facing their screen

IMPORTANT: Brief breaks are part of studying
- Drinking water is a normal, healthy break that should be considered as studying (person is still in their study environment)
- Stretching or taking a brief break while at the desk is part of studying (person is maintaining focus and taking care of themselves)
- These brief activities indicate the person is actively managing their study session and should be counted as studying

Person is PRESENT and studying if:
- Person is visible and facing the screen/desk/camera
- Person is looking at the screen or camera (this indicates they are facing their work)
- Person appears engaged with computer/work materials
- Person is actively reading, writing, or working
- Person is focused on their study materials
- Person is taking a brief break (drinking water, stretching) while at their study location
- Person is in their study environment and taking short, healthy breaks

Person is PRESENT but NOT studying if:
- Person is using a phone, tablet, or mobile device (not the computer screen)
- Person is looking away from their work/screen (turned away, looking at something else, completely disengaged)
- Person is eating a full meal (not just a quick snack or drink)
- Person appears completely distracted or not focused on their work environment
- Person is talking on phone or video calling (not study-related)
- Person is sleeping or appears completely unengaged

Format your response as:
PERSON_PRESENT: [yes or no]
ACTIVITY: [description of what person is doing - e.g., "using phone", "looking at screen", "looking at camera", "drinking water", "stretching or taking a break", "absent from camera"]
IS_STUDYING: [yes or no]
DETAILS: [additional context - what device they're using, their posture, engagement level, etc.]`;

export const warningMessage = (activity: string): string =>
  `Hey! Looks like you are doing ${activity}, you should be focusing!`;
